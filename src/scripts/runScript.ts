import { AppError, isFatal } from '../utils/errors';
import logger from '../utils/logger';

/**
 * Обвязка CLI: запуск и код выхода.
 * 0 — прогон дошёл до конца (даже с отказами по позициям), 1 — фатальная ошибка.
 */
export async function runScript(name: string, main: () => Promise<void>): Promise<number> {
  const startedAt = Date.now();

  try {
    logger.info(`🔄 ${name} started`);
    await main();
    logger.info(`✅ ${name} completed in ${((Date.now() - startedAt) / 1000).toFixed(1)}s`);
    return 0;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`❌ ${name} failed${isFatal(error) ? '' : ' unexpectedly'}: ${err.message}`, {
      code: error instanceof AppError ? error.code : undefined,
      stack: error instanceof AppError ? undefined : err.stack,
    });
    return 1;
  }
}
