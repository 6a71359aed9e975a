import fs from 'fs';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { DebugArtifacts } from '../src/artifacts';
import { DebugConfig } from '../src/types';
import { FakeSiteDriver } from './helpers/fake-site-driver';
import { silentLogger, tempDir } from './helpers/config';

const NOW = () => new Date(2024, 3, 1, 9, 5, 7);

function debugConfig(overrides: Partial<DebugConfig> = {}): DebugConfig {
  return {
    enabled: true,
    saveScreenshots: true,
    saveHtml: true,
    sendNotifications: false,
    notificationIntervalSeconds: 300,
    ...overrides,
  };
}

describe('DebugArtifacts', () => {
  it('purges old captures at start and keeps other files', () => {
    const dir = tempDir();
    fs.writeFileSync(path.join(dir, 'old_20240101_000000.png'), 'x');
    fs.writeFileSync(path.join(dir, 'old_20240101_000000.html'), 'x');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'keep');

    new DebugArtifacts(dir, debugConfig(), silentLogger).prepare();

    expect(fs.readdirSync(dir)).toEqual(['notes.txt']);
  });

  it('writes a screenshot and page source in debug mode', async () => {
    const dir = tempDir();
    const driver = new FakeSiteDriver();
    driver.setPage('https://portal.test/en-ca/niv/groups/4242', {}, '<html>groups</html>');
    const artifacts = new DebugArtifacts(dir, debugConfig(), silentLogger, NOW);

    const artifact = await artifacts.capture(driver, 'monitor_error');

    expect(artifact).toEqual({
      timestamp: '20240401_090507',
      prefix: 'monitor_error',
      url: 'https://portal.test/en-ca/niv/groups/4242',
      screenshotPath: path.join(dir, 'monitor_error_20240401_090507.png'),
      pageSourcePath: path.join(dir, 'monitor_error_20240401_090507.html'),
    });
    expect(fs.readFileSync(path.join(dir, 'monitor_error_20240401_090507.html'), 'utf-8')).toBe(
      '<html>groups</html>'
    );
  });

  it('honours the screenshot and page source switches', async () => {
    const dir = tempDir();
    const artifacts = new DebugArtifacts(dir, debugConfig({ saveScreenshots: false }), silentLogger, NOW);

    const artifact = await artifacts.capture(new FakeSiteDriver(), 'system_busy');

    expect(artifact?.screenshotPath).toBeUndefined();
    expect(fs.readdirSync(dir)).toEqual(['system_busy_20240401_090507.html']);
  });

  it('only logs when debug mode is off', async () => {
    const dir = tempDir();
    const artifacts = new DebugArtifacts(dir, debugConfig({ enabled: false }), silentLogger, NOW);

    await expect(artifacts.capture(new FakeSiteDriver(), 'login_error')).resolves.toBeNull();
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
