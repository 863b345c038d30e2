import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { loadNotificationConfig, DEFAULT_CONFIG } from '../../src/infrastructure/notifications/config.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-config');

function writeTmpYaml(content: string): string {
  mkdirSync(TMP_DIR, { recursive: true });
  const path = join(TMP_DIR, 'notifications.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('loadNotificationConfig', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('returns defaults when file does not exist', () => {
    const config = loadNotificationConfig('/nonexistent/path.yaml');
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults for empty file', () => {
    const path = writeTmpYaml('');
    const config = loadNotificationConfig(path);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('parses slack config', () => {
    const path = writeTmpYaml(
      'slack:\n  enabled: true\n  webhook_url: "https://hooks.example.test/alerts"\n  min_severity: medium\n',
    );
    const config = loadNotificationConfig(path);
    expect(config.slack).toEqual({
      enabled: true,
      webhook_url: 'https://hooks.example.test/alerts',
      min_severity: 'medium',
    });
  });

  it('falls back to the default min severity for unknown levels', () => {
    const path = writeTmpYaml('slack:\n  enabled: true\n  min_severity: urgent\n');
    const config = loadNotificationConfig(path);
    expect(config.slack.min_severity).toBe('high');
    expect(config.slack.webhook_url).toBe('');
  });

  it('ignores comments and unrelated sections', () => {
    const yaml = [
      '# alert channels',
      'pager:',
      '  enabled: true',
      '',
      'slack:',
      '  # off until the channel exists',
      '  enabled: false',
      '  webhook_url: ""',
    ].join('\n');
    const path = writeTmpYaml(yaml);
    const config = loadNotificationConfig(path);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('reads the shipped config file', () => {
    const config = loadNotificationConfig(join(process.cwd(), 'config', 'notifications.yaml'));
    expect(config).toEqual(DEFAULT_CONFIG);
  });
});
