import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { loadEnvConfig } from '../env.js';
import { parseConfig } from '../ConfigFile.js';
import { Dispatcher } from '../../core/Dispatcher.js';
import { ConfigError } from '../../core/errors.js';
import { MemoryS3 } from '../../__tests__/fixtures/memoryS3.js';
import { makeTempDir, removeTempDir } from '../../__tests__/fixtures/sampleTree.js';

describe('loadEnvConfig', () => {
  it('falls back to defaults on an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({
      clientConfig: {},
      acl: 'bucket-owner-full-control',
      concurrency: 100,
      logLevel: 'warn',
    });
  });

  it('reads every supported variable', () => {
    const config = loadEnvConfig({
      AWS_REGION: 'eu-central-1',
      AWS_PROFILE: 'batch',
      PATHBRIDGE_S3_ENDPOINT: 'http://localhost:9000',
      PATHBRIDGE_S3_FORCE_PATH_STYLE: 'yes',
      PATHBRIDGE_ACL: 'private',
      PATHBRIDGE_CONCURRENCY: '8',
      PATHBRIDGE_LOG_LEVEL: 'DEBUG',
    });

    expect(config).toEqual({
      clientConfig: {
        region: 'eu-central-1',
        profile: 'batch',
        endpoint: 'http://localhost:9000',
        forcePathStyle: true,
      },
      acl: 'private',
      concurrency: 8,
      logLevel: 'debug',
    });
  });

  it.each([
    ['PATHBRIDGE_CONCURRENCY', '0', "PATHBRIDGE_CONCURRENCY must be a positive integer, got '0'"],
    ['PATHBRIDGE_CONCURRENCY', 'many', "PATHBRIDGE_CONCURRENCY must be a positive integer, got 'many'"],
    ['PATHBRIDGE_S3_FORCE_PATH_STYLE', 'maybe', "PATHBRIDGE_S3_FORCE_PATH_STYLE must be true or false, got 'maybe'"],
    ['PATHBRIDGE_LOG_LEVEL', 'loud', "PATHBRIDGE_LOG_LEVEL must be debug, info, warn or error; got 'loud'"],
    ['PATHBRIDGE_LOG_LEVEL', 'constructor', "PATHBRIDGE_LOG_LEVEL must be debug, info, warn or error; got 'constructor'"],
    ['PATHBRIDGE_S3_ENDPOINT', 'not a url', "PATHBRIDGE_S3_ENDPOINT is not a valid URL: 'not a url'"],
  ])('rejects a bad %s', (name, value, message) => {
    expect(() => loadEnvConfig({ [name]: value })).toThrow(ConfigError);
    expect(() => loadEnvConfig({ [name]: value })).toThrow(message);
  });

  it('rejects an unknown ACL', () => {
    expect(() => loadEnvConfig({ PATHBRIDGE_ACL: 'everyone' })).toThrow(ConfigError);
  });
});

describe('parseConfig', () => {
  let root: string;
  let dispatcher: Dispatcher;

  beforeEach(async () => {
    root = await makeTempDir();
    dispatcher = new Dispatcher();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('loads a JSON object', async () => {
    const path = join(root, 'job.json');
    await writeFile(path, JSON.stringify({ bucket: 'data', days: 7 }));

    expect(await parseConfig(dispatcher, path, ['bucket'])).toEqual({ bucket: 'data', days: 7 });
  });

  it('names missing required keys', async () => {
    const path = join(root, 'job.json');
    await writeFile(path, JSON.stringify({ bucket: 'data' }));

    await expect(parseConfig(dispatcher, path, ['bucket', 'days', 'owner'])).rejects.toThrow(
      'Missing required configuration key(s): days, owner'
    );
  });

  it('fails for a missing file', async () => {
    const path = join(root, 'missing.json');
    await expect(parseConfig(dispatcher, path)).rejects.toThrow(`'${path}' does not exist`);
  });

  it('fails for malformed JSON and non-objects', async () => {
    const broken = join(root, 'broken.json');
    const list = join(root, 'list.json');
    await writeFile(broken, '{ nope');
    await writeFile(list, '[1, 2]');

    await expect(parseConfig(dispatcher, broken)).rejects.toThrow(/^Failed to parse config file: /);
    await expect(parseConfig(dispatcher, list)).rejects.toThrow('Config file must contain a JSON object');
  });

  it('reads configuration stored on S3', async () => {
    const s3 = new MemoryS3(['configs']);
    s3.put('configs', 'jobs/daily.json', '{"window": 3}');

    const remote = new Dispatcher({ client: s3.client });
    expect(await parseConfig(remote, 's3://configs/jobs/daily.json')).toEqual({ window: 3 });
    s3.restore();
  });
});
