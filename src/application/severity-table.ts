import type { EventEnvelope, Severity } from '../domain/index.js';
import { ALERT_MESSAGE_MAX, ALERT_TITLE_MAX } from '../domain/index.js';
import { readVerdict } from './envelope-schema.js';

export interface AlertClassification {
  severity: Severity;
  category: string;
  title: string;
  message: string;
}

type Payload = EventEnvelope['payload'];

interface Rule {
  severity: Severity;
  category: string;
  describe: (payload: Payload, envelope: EventEnvelope) => { title: string; message: string };
}

function text(payload: Payload, key: string, fallback: string): string {
  const value = payload[key];
  if (typeof value === 'string' && value.trim() !== '') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

function amount(payload: Payload, key: string): number {
  const value = payload[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return 0;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function verdictRule(label: string, responder: string): Rule {
  return {
    severity: 'low',
    category: 'validation',
    describe: (payload) => {
      const state = readVerdict(payload)?.state ?? 'undecided';
      const summary = text(payload, 'summary', '');
      return {
        title: `${label} ${capitalize(state)}`,
        message: summary || `${responder} has ${state === 'undecided' ? 'answered' : state} the ${label.toLowerCase()}`,
      };
    },
  };
}

/** Fixed classification of every kind that becomes an alert. */
const RULES: Readonly<Record<string, Rule>> = {
  sales_data_updated: {
    severity: 'medium',
    category: 'analytics',
    describe: (payload) => ({
      title: 'Sales Data Updated',
      message: `New sales data received, analytics may need refresh. Period: ${text(payload, 'period', 'unknown')}`,
    }),
  },
  inventory_updated: {
    severity: 'medium',
    category: 'inventory',
    describe: (payload) => ({
      title: 'Inventory Updated',
      message: `Operations reports inventory change: ${text(payload, 'item_name', 'Unknown')} (${text(payload, 'sku', '')}) now at ${amount(payload, 'quantity')} units`,
    }),
  },
  campaign_performance: {
    severity: 'medium',
    category: 'analytics',
    describe: (payload) => ({
      title: 'Campaign Performance Update',
      message: `Marketing campaign '${text(payload, 'campaign_name', 'Unknown')}' ROAS: ${amount(payload, 'roas').toFixed(2)}x`,
    }),
  },
  financial_report: {
    severity: 'medium',
    category: 'finance',
    describe: (payload) => ({
      title: `Financial Report: ${text(payload, 'report_type', 'general')}`,
      message: text(payload, 'summary', 'Financial report received from finance'),
    }),
  },
  margin_check_response: verdictRule('Margin Check', 'Finance'),
  capacity_check_response: verdictRule('Capacity Check', 'Operations'),
  approval_decided: {
    severity: 'low',
    category: 'approval',
    describe: (payload) => {
      const state = readVerdict(payload)?.state ?? 'undecided';
      return {
        title: `Request ${capitalize(state)}`,
        message: text(payload, 'summary', `Executive has ${state === 'undecided' ? 'answered' : state} the request`),
      };
    },
  },
  validation_timed_out: {
    severity: 'high',
    category: 'validation',
    describe: (payload) => ({
      title: `Validation Timed Out: ${text(payload, 'request_type', 'unknown')}`,
      message: `No verdict from ${text(payload, 'target_module', 'unknown')} for pipeline item ${text(payload, 'pipeline_item_id', 'unknown')} before ${text(payload, 'deadline', 'the deadline')}`,
    }),
  },
  delivery_failed: {
    severity: 'critical',
    category: 'delivery',
    describe: (payload) => {
      const original = payload['envelope'];
      const reasons = payload['reasons'];
      const type = isRecord(original) ? text(original, 'type', 'unknown') : 'unknown';
      const target = isRecord(original) ? text(original, 'targetModule', 'broadcast') : 'broadcast';
      return {
        title: `Delivery Failed: ${type}`,
        message: `Envelope for ${target} could not be delivered on any path${
          Array.isArray(reasons) && reasons.length > 0 ? `: ${reasons.map(String).join('; ')}` : ''
        }`,
      };
    },
  },
};

const UNCLASSIFIED: Rule = {
  severity: 'low',
  category: 'unclassified',
  describe: (payload, envelope) =>
    envelope.type === 'malformed_event'
      ? {
          title: 'Malformed Event Dropped',
          message: `Envelope received via ${text(payload, 'path', 'unknown')} path failed validation`,
        }
      : {
          title: `Unrecognized Event: ${envelope.type}`,
          message: `Event ${envelope.type} from ${envelope.sourceModule} has no handler`,
        },
};

/** Shortens to `max` UTF-16 units, ending in an ellipsis. */
function clip(value: string, max: number): string {
  if (value.length <= max) return value;
  let cut = max - 1;
  // Keep surrogate pairs whole.
  const last = value.charCodeAt(cut - 1);
  if (last >= 0xd800 && last <= 0xdbff) cut--;
  return `${value.slice(0, cut)}…`;
}

function isRecord(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function classify(envelope: EventEnvelope): AlertClassification {
  const rule = (Object.hasOwn(RULES, envelope.type) && RULES[envelope.type]) || UNCLASSIFIED;
  const { title, message } = rule.describe(envelope.payload, envelope);
  return {
    severity: rule.severity,
    category: rule.category,
    title: clip(title, ALERT_TITLE_MAX),
    message: clip(message, ALERT_MESSAGE_MAX),
  };
}
