import express, { type Express } from 'express';
import cors from 'cors';
import type { GovernanceEngine } from './governance/engine.js';
import { requestLogger } from './middleware/logger.js';
import { createGovernanceRouter } from './routes/governance.js';
import { createHealthRouter } from './routes/health.js';
import { bigintReplacer } from './storage/logStore.js';

export function createApp(engine: GovernanceEngine): Express {
  const app = express();

  // ─── Middleware ──────────────────────────────────────────
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);
  app.set('json replacer', bigintReplacer);

  // ─── Routes ─────────────────────────────────────────────
  app.use('/', createHealthRouter());
  app.use('/api/governance', createGovernanceRouter(engine));

  return app;
}
