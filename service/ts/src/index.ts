import 'dotenv/config';

import { createApp } from './app.js';
import { isAuthDisabled } from './auth.js';
import { loadConfig } from './config.js';
import { getStore } from './store/index.js';

const config = loadConfig();
const store = getStore();
const app = createApp(store);

export { app };

if (process.env.NODE_ENV !== 'test') {
  if (isAuthDisabled()) {
    console.warn('auth_disabled', { reason: 'AUTH_DISABLE=1 or no provider configured' });
  }
  app.listen(config.port, () =>
    console.log(`Swiss tournament service listening on :${config.port} (store: ${config.storeDriver})`)
  );
}
