import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadConfig } from './config';

const config = loadConfig();
const app = createApp(config);

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`🚀 Activity stats listening on http://localhost:${info.port}`);
});
