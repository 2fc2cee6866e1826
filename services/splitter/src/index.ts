import 'dotenv/config';
import express, { type Request, type Response } from 'express';
import { loadSplitterEnv, type SplitterEnv } from '../../../src/config/env';
import { GoogleSheetsGateway } from '../../../src/sheets/client';
import { PubSubPublisher } from './pubsub';
import { FAILED_STATUS_FOR_REPORTING, handleSplitRequest, type SplitterDeps } from './split';

export function createApp(deps: SplitterDeps) {
  const app = express();
  app.use(express.json());

  app.get('/', (_req, res) => res.status(200).send('OK'));
  app.get('/healthz', (_req, res) => res.status(200).send('OK'));

  // ---------------------------------------------------------
  // POST / { worksheet_url, tool_config_sheet_name }
  // ---------------------------------------------------------
  app.post('/', async (req: Request, res: Response) => {
    console.log('📦 Split request:', JSON.stringify(req.body));
    const result = await handleSplitRequest(req.body, deps);
    res.status(result.code).send(result.body);
  });

  return app;
}

function main(): void {
  let env: SplitterEnv;
  try {
    env = loadSplitterEnv();
  } catch (err) {
    console.error(
      `${FAILED_STATUS_FOR_REPORTING}: Cannot proceed, there are missing input values please make sure you set all the environment variables correctly.`,
      err
    );
    process.exit(1);
  }

  const publisher = new PubSubPublisher(env.PROJECT_ID);
  const app = createApp({
    sheets: new GoogleSheetsGateway(),
    publisher,
    topic: env.PUBSUB_TOPIC,
    statusColumns: {
      STATUS_COLUMN: env.STATUS_COLUMN,
      UPDATED_AT_COLUMN: env.UPDATED_AT_COLUMN,
      MESSAGE_COLUMN: env.MESSAGE_COLUMN,
    },
  });

  const server = app.listen(env.PORT, () => {
    console.log(`🚀 Splitter (${env.DEPLOYMENT_NAME}) listening on port ${env.PORT}, topic: ${env.PUBSUB_TOPIC}`);
  });

  process.on('SIGTERM', () => {
    console.log('🛑 SIGTERM received.');
    server.close();
    publisher.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('💀 Publisher close failed:', err);
        process.exit(1);
      }
    );
  });
}

if (require.main === module) {
  main();
}
