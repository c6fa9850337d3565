import 'dotenv/config';
import { loadOzonConfig } from '../config/env';
import { runOzonSync } from '../services/sync/ozonSync';
import { runScript } from './runScript';

if (require.main === module) {
  runScript('Ozon price & stock sync', async () => {
    await runOzonSync(loadOzonConfig());
  }).then((code) => process.exit(code));
}
