import 'dotenv/config';
import { loadYandexMarketConfig } from '../config/env';
import { runYandexMarketSync } from '../services/sync/yandexMarketSync';
import { runScript } from './runScript';

if (require.main === module) {
  runScript('Yandex.Market price & stock sync', async () => {
    await runYandexMarketSync(loadYandexMarketConfig());
  }).then((code) => process.exit(code));
}
