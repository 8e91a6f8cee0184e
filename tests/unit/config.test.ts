import { writeFileSync } from 'fs';
import { config, loadConfig } from '../../src/config';
import { createTokenDir } from '../helpers/tokenFile';

describe('Configuration', () => {
  it('should load the log level from LOG_LEVEL', () => {
    expect(config.logLevel).toBe('silent');
  });

  it('should have a token path', () => {
    expect(config.tokenPath).toBeDefined();
    expect(config.tokenPath.length).toBeGreaterThan(0);
  });

  describe('loadConfig', () => {
    const workdir = createTokenDir();
    const savedEnv = { ...process.env };

    beforeAll(() => {
      writeFileSync(
        `${workdir.dir}/.env`,
        [
          'LOG_LEVEL=debug',
          'LAUNCH_ENV_TOKEN_PATH=/tmp/token-from-dotenv',
          'AGNOS_VERSION=9.9',
          'MAPBOX_TOKEN=from-dotenv',
          '',
        ].join('\n')
      );
    });

    afterEach(() => {
      for (const key of Object.keys(process.env)) {
        if (!(key in savedEnv)) {
          delete process.env[key];
        }
      }
      Object.assign(process.env, savedEnv);
    });

    afterAll(() => {
      workdir.cleanup();
    });

    it('should read launcher settings from .env', () => {
      expect(loadConfig({ cwd: workdir.dir, env: {} })).toEqual({
        logLevel: 'debug',
        tokenPath: '/tmp/token-from-dotenv',
      });
    });

    it('should prefer the environment over .env', () => {
      expect(loadConfig({ cwd: workdir.dir, env: { LOG_LEVEL: 'warn' } }).logLevel).toBe('warn');
    });

    it('should not copy .env into process.env', () => {
      delete process.env.AGNOS_VERSION;
      delete process.env.MAPBOX_TOKEN;

      loadConfig({ cwd: workdir.dir });

      expect(process.env).not.toHaveProperty('AGNOS_VERSION');
      expect(process.env).not.toHaveProperty('MAPBOX_TOKEN');
    });

    it('should fall back to defaults without .env', () => {
      expect(loadConfig({ cwd: `${workdir.dir}/missing`, env: {} })).toEqual({
        logLevel: 'info',
        tokenPath: '/data/media/0/dp_nav_mapbox_token',
      });
    });
  });
});
