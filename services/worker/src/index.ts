import 'dotenv/config';
import express, { type Request, type Response } from 'express';
import { loadWorkerEnv, type WorkerEnv } from '../../../src/config/env';
import { GoogleSheetsGateway } from '../../../src/sheets/client';
import { GcsObjectStore } from './util';
import { CommandDubbingEngine } from './services/dubber';
import { handleDubbingMessage, type WorkerDeps } from './handler';
import { FAILED_STATUS_FOR_REPORTING } from './constants';

export function createApp(deps: WorkerDeps) {
  const app = express();
  // 動画の台本が入るので大きめに
  app.use(express.json({ limit: '10mb' }));

  // ---------------------------------------------------------
  // 1. Health Check
  // ---------------------------------------------------------
  app.get('/', (_req, res) => res.status(200).send('OK'));
  app.get('/healthz', (_req, res) => res.status(200).send('OK'));

  // ---------------------------------------------------------
  // 2. Pub/Sub push endpoint（1 リクエスト = 1 行）
  // ---------------------------------------------------------
  app.post('/', async (req: Request, res: Response) => {
    const result = await handleDubbingMessage(req.body, deps);
    res.status(result.code).send(result.body);
  });

  return app;
}

function main(): void {
  let env: WorkerEnv;
  try {
    env = loadWorkerEnv();
  } catch (err) {
    console.error(
      `${FAILED_STATUS_FOR_REPORTING}: Cannot proceed, there are missing input values please make sure you set all the environment variables correctly.`,
      err
    );
    process.exit(1);
  }

  const commandLine = env.DUBBING_ENGINE_COMMAND;
  const app = createApp({
    sheets: new GoogleSheetsGateway(),
    store: new GcsObjectStore(),
    createEngine: () => new CommandDubbingEngine(commandLine),
    outputDirectory: env.OUTPUT_DIRECTORY,
  });

  const server = app.listen(env.PORT, () => {
    console.log(`🚀 Dubbing worker (${env.DEPLOYMENT_NAME}) listening on port ${env.PORT}`);
  });

  // Graceful Shutdown
  process.on('SIGTERM', () => {
    console.log('🛑 SIGTERM received.');
    server.close(() => process.exit(0));
  });
}

if (require.main === module) {
  main();
}
