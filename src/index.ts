import 'dotenv/config';

import express from 'express';
import cookieParser from 'cookie-parser';
import { InterviewEngine } from './agents/InterviewEngine.js';
import { loadConfig } from './config.js';
import { ReasonerGateway } from './reasoner/gateway.js';
import { loadModelCatalog } from './reasoner/modelCatalog.js';
import { OpenRouterReasoner } from './reasoner/openrouterClient.js';
import { createInterviewRouter } from './routes/interview.js';
import { createSessionStore } from './sessionStore.js';
import type { InterviewSettings } from './types.js';

const config = loadConfig();
const settings: InterviewSettings = {
  targetConfidence: config.interview.targetConfidence,
  minQuestions: config.interview.minQuestions,
  maxQuestions: config.interview.maxQuestions,
  extensionMaxQuestions: config.interview.extensionMaxQuestions
};

const catalog = loadModelCatalog(config.modelCatalogPath);
const reasoner = new OpenRouterReasoner({ ...config.openRouter, timeoutMs: config.reasoner.timeoutMs });
const gateway = new ReasonerGateway(reasoner, catalog, config.reasoner);
const store = createSessionStore(config.redis, settings);
const engine = new InterviewEngine(store, gateway, {
  settings,
  dedupThreshold: config.interview.dedupThreshold,
  dedupRetries: config.interview.dedupRetries,
  autoComplete: config.interview.autoComplete
});

// kill -HUP reloads the model list without dropping sessions
process.on('SIGHUP', () => {
  try {
    catalog.replace([...loadModelCatalog(config.modelCatalogPath).list()]);
    console.log(`[Catalog] reloaded ${catalog.list().length} models from ${config.modelCatalogPath}`);
  } catch (err) {
    console.error('[Catalog] reload failed, keeping the previous list:', err);
  }
});

const app = express();
app.use(express.json());
app.use(cookieParser());

// routes
app.use('/interview', createInterviewRouter(engine));

app.listen(config.port, () => console.log(`Listening on port ${config.port}`));
