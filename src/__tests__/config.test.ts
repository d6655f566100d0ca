import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import path from 'path';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      env: 'development',
      port: 8000,
      logLevel: 'info',
      corsOrigin: '*',
      rateLimit: { windowMs: 900000, max: 100 },
      docsEnabled: true,
      seedDemoData: true,
      version: '1.0.0'
    });
  });

  it('parses values from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '3000',
      RATE_LIMIT_MAX_REQUESTS: '10',
      DOCS_ENABLED: 'false',
      SEED_DEMO_DATA: 'false',
      APP_VERSION: '2.0.0'
    });

    expect(config.env).toBe('production');
    expect(config.port).toBe(3000);
    expect(config.rateLimit.max).toBe(10);
    expect(config.docsEnabled).toBe(false);
    expect(config.seedDemoData).toBe(false);
    expect(config.version).toBe('2.0.0');
  });

  it('rejects invalid values, naming each variable', () => {
    const load = () => loadConfig({ PORT: 'abc', LOG_LEVEL: 'loud' });

    expect(load).toThrow(/^Invalid environment configuration: PORT must be a number, /);
    expect(load).toThrow(/LOG_LEVEL must be one of/);
  });
});

describe('build configuration', () => {
  it('keeps tests out of the compiled output', () => {
    const buildConfig: { extends: string; exclude: string[] } = JSON.parse(
      readFileSync(path.join(__dirname, '..', '..', 'tsconfig.build.json'), 'utf8')
    );

    expect(buildConfig.extends).toBe('./tsconfig.json');
    expect(buildConfig.exclude).toContain('src/**/__tests__');
  });
});
