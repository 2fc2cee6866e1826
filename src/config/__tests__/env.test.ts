import { describe, expect, it } from 'vitest';
import { MissingEnvError, loadSplitterEnv, loadWorkerEnv } from '../env';

const common = {
  PROJECT_ID: 'test-project',
  REGION: 'us-central1',
  SERVICE_ACCOUNT: 'dubbing@test-project.iam.gserviceaccount.com',
  DEPLOYMENT_NAME: 'test',
};

describe('loadSplitterEnv', () => {
  it('lists every missing variable', () => {
    const err = (() => {
      try {
        loadSplitterEnv({});
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(MissingEnvError);
    expect(err instanceof MissingEnvError ? err.missing : []).toEqual([
      'PROJECT_ID',
      'REGION',
      'SERVICE_ACCOUNT',
      'DEPLOYMENT_NAME',
      'PUBSUB_TOPIC',
    ]);
  });

  it('treats empty values as missing', () => {
    expect(() => loadSplitterEnv({ ...common, PUBSUB_TOPIC: '' })).toThrow('Missing env: PUBSUB_TOPIC');
  });

  it('fills in the port and status columns', () => {
    const env = loadSplitterEnv({ ...common, PUBSUB_TOPIC: 'dub-jobs' });
    expect(env.PORT).toBe(8080);
    expect([env.STATUS_COLUMN, env.UPDATED_AT_COLUMN, env.MESSAGE_COLUMN]).toEqual(['P', 'Q', 'R']);
  });

  it('accepts overrides', () => {
    const env = loadSplitterEnv({ ...common, PUBSUB_TOPIC: 'dub-jobs', PORT: '9090', STATUS_COLUMN: 'AA' });
    expect(env.PORT).toBe(9090);
    expect(env.STATUS_COLUMN).toBe('AA');
  });
});

describe('loadWorkerEnv', () => {
  it('requires an output directory', () => {
    expect(() => loadWorkerEnv(common)).toThrow('Missing env: OUTPUT_DIRECTORY');
  });

  it('defaults the engine command', () => {
    const env = loadWorkerEnv({ ...common, OUTPUT_DIRECTORY: '/tmp/dubbing' });
    expect(env.OUTPUT_DIRECTORY).toBe('/tmp/dubbing');
    expect(env.DUBBING_ENGINE_COMMAND).toBe('dubbing-engine');
  });
});
