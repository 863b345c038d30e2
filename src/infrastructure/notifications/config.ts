import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Severity } from '../../domain/index.js';
import { isSeverity } from '../../domain/index.js';

/**
 * Alert notification channels, loaded from YAML.
 */
export interface NotificationConfig {
  slack: { enabled: boolean; webhook_url: string; min_severity: Severity };
}

/**
 * Default configuration: Slack disabled, high alerts and above once enabled.
 */
export const DEFAULT_CONFIG: NotificationConfig = {
  slack: { enabled: false, webhook_url: '', min_severity: 'high' },
};

type Section = Record<string, string | boolean>;

function scalar(raw: string): string | boolean {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === '""' || raw === "''") return '';
  if (raw.length >= 2 && (raw.startsWith('"') || raw.startsWith("'")) && raw.endsWith(raw.charAt(0))) {
    return raw.slice(1, -1);
  }
  return raw;
}

/**
 * Minimal YAML reader for config/notifications.yaml: top-level section
 * keys with indented scalar values. Comments and blank lines are skipped.
 */
function parseSimpleYaml(content: string): Record<string, Section> {
  const result: Record<string, Section> = {};
  let section: Section | undefined;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trim().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const key = line.slice(0, colonIdx).trim();
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      section = {};
      result[key] = section;
      continue;
    }

    if (section) section[key] = scalar(line.slice(colonIdx + 1).trim());
  }

  return result;
}

/**
 * Loads notification configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unreadable;
 * missing or invalid keys take their default.
 */
export function loadNotificationConfig(configPath?: string): NotificationConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'notifications.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return { slack: { ...DEFAULT_CONFIG.slack } };
  }

  const slack = parseSimpleYaml(content)['slack'] ?? {};
  const enabled = slack['enabled'];
  const webhookUrl = slack['webhook_url'];
  const minSeverity = slack['min_severity'];

  return {
    slack: {
      enabled: typeof enabled === 'boolean' ? enabled : DEFAULT_CONFIG.slack.enabled,
      webhook_url: typeof webhookUrl === 'string' ? webhookUrl : DEFAULT_CONFIG.slack.webhook_url,
      min_severity:
        typeof minSeverity === 'string' && isSeverity(minSeverity) ? minSeverity : DEFAULT_CONFIG.slack.min_severity,
    },
  };
}
