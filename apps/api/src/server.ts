import 'dotenv/config';
import { serve } from '@hono/node-server';
import { CareCircleEngine } from '@carecircle/core';
import { createApp, loadConfig } from './index.js';

const config = loadConfig(process.env);
const engine = new CareCircleEngine({ transactionAttempts: config.transactionAttempts });
const app = createApp({ engine, config });

serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`[API] CareCircle API listening on http://localhost:${info.port} (docs at /api/docs)`);
});
