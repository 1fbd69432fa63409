/**
 * Keyword fallback and slot extraction rules
 *
 * Fallback patterns are checked in order; the first match wins.
 */

export interface FallbackPattern {
  label: string;
  pattern: RegExp;
}

export type SlotExtractor = (text: string) => Record<string, string>;

export const DEFAULT_FALLBACK_PATTERNS: readonly FallbackPattern[] = [
  { label: 'port_scan', pattern: /\bports?\b/i },
  { label: 'vulnerability_scan', pattern: /\b(vuln\w*|cves?|exploits?)\b/i },
  { label: 'network_scan', pattern: /\b(network|subnet|lan|wifi)\b/i },
  { label: 'port_scan', pattern: /\bscan\b/i },
  { label: 'docker', pattern: /\b(docker|containers?)\b/i },
  {
    label: 'system_status',
    pattern: /\b(cpu|ram|memory usage|disk|battery|processes)\b/i,
  },
  { label: 'weather', pattern: /\b(weather|forecast|temperature|rain)\b/i },
  { label: 'news', pattern: /\b(news|headlines)\b/i },
  { label: 'reminder', pattern: /\bremind(er)?s?\b/i },
  { label: 'memory_note', pattern: /\b(remember|note) that\b/i },
  { label: 'web_search', pattern: /\b(search|google|look up)\b/i },
  { label: 'open_app', pattern: /^\s*(open|launch)\b/i },
  { label: 'help', pattern: /\bhelp\b/i },
  {
    label: 'greeting',
    pattern: /^\s*(hi|hello|hey|good (morning|evening))\b/i,
  },
];

/**
 * Slot values that refer back to something mentioned earlier
 */
export const PRONOUNS: ReadonlySet<string> = new Set([
  'it',
  'that',
  'this',
  'there',
  'them',
]);

const IP_PATTERN = /\b(\d{1,3}(?:\.\d{1,3}){3}(?:\/\d{1,2})?)\b/;
const HOSTNAME_PATTERN = /\b((?:[a-z0-9-]+\.)+[a-z]{2,})\b/i;
const PRONOUN_TARGET_PATTERN =
  /\b(?:scan|check|audit|probe|sweep|against|on)\s+(it|that|this|there|them)\b/i;

// ─────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────

function capture(text: string, pattern: RegExp): string | null {
  const value = pattern.exec(text)?.[1]?.trim();
  return value ? value : null;
}

function extractTarget(text: string): Record<string, string> {
  const target =
    capture(text, IP_PATTERN) ??
    capture(text, HOSTNAME_PATTERN) ??
    capture(text, PRONOUN_TARGET_PATTERN);
  return target ? { target: target.toLowerCase() } : {};
}

function trimTrailingPunctuation(value: string): string {
  return value.replace(/[?.!]+$/, '').trim();
}

function slotFrom(
  name: string,
  text: string,
  pattern: RegExp
): Record<string, string> {
  const value = capture(text, pattern);
  if (!value) {
    return {};
  }
  const cleaned = trimTrailingPunctuation(value);
  return cleaned ? { [name]: cleaned } : {};
}

// ─────────────────────────────────────────────────────────────
// EXTRACTORS
// ─────────────────────────────────────────────────────────────

function portScanSlots(text: string): Record<string, string> {
  const slots = extractTarget(text);
  const ports = capture(text, /\bports?\s+(\d+(?:\s*(?:-|,|and)\s*\d+)*)/i);
  if (ports) {
    slots.ports = ports.replace(/\s*(?:,|and)\s*/g, ',').replace(/\s+/g, '');
  }
  return slots;
}

function dockerSlots(text: string): Record<string, string> {
  const slots: Record<string, string> = {};
  const action = capture(
    text,
    /\b(list|show|start|stop|restart|remove|logs|stats|images)\b/i
  );
  if (action) {
    slots.action = action.toLowerCase();
  }
  const container =
    capture(text, /\bcontainer\s+([a-z0-9][\w.-]*)/i) ??
    capture(text, /\b(?:the|from the)\s+([a-z0-9][\w.-]*)\s+container\b/i);
  if (container) {
    slots.container = container.toLowerCase();
  }
  return slots;
}

function systemStatusSlots(text: string): Record<string, string> {
  const resource = capture(
    text,
    /\b(cpu|processor|memory|ram|disk|battery|processes)\b/i
  );
  if (!resource) {
    return {};
  }
  const normalized = resource.toLowerCase();
  const aliases: Record<string, string> = { processor: 'cpu', ram: 'memory' };
  return { resource: aliases[normalized] ?? normalized };
}

function reminderSlots(text: string): Record<string, string> {
  const slots = slotFrom(
    'message',
    text,
    /\bremind me(?:\s+(?:in\s+\d+\s+\w+|tomorrow|tonight))?\s+to\s+(.+)$/i
  );
  const when =
    capture(text, /\b(in\s+\d+\s+(?:seconds?|minutes?|hours?|days?))\b/i) ??
    capture(text, /\bat\s+(\d{1,2}(?::\d{2})?\s*(?:am|pm)?)/i) ??
    capture(text, /\bfor\s+(\d{1,2}(?::\d{2})?\s*(?:am|pm))/i) ??
    capture(text, /\b(tomorrow|tonight)\b/i);
  if (when) {
    slots.when = when.toLowerCase();
  }
  return slots;
}

const WEATHER_CITY = /\b(?:in|for|at)\s+([a-z][a-z\s-]*?)\s*(?:today|tomorrow)?[?.!]*$/i;
const NEWS_TOPIC = /\b(?:about|on)\s+(?:the\s+)?(.+)$/i;
const APP_NAME = /^\s*(?:open|launch|start|run)\s+(?:the\s+)?(.+)$/i;
const SEARCH_QUERY =
  /\b(?:search(?: the web| online)? for|look up|google|about)\s+(.+)$/i;
const NOTE_TEXT =
  /\b(?:remember(?: that)?|note that|jot down(?: that)?|write down(?: that)?)\s+(.+)$/i;
const RECALL_QUERY = /\b(?:about|for)\s+(?:the\s+|my\s+)?(.+)$/i;

export const DEFAULT_SLOT_EXTRACTORS: Readonly<Record<string, SlotExtractor>> =
  {
    port_scan: portScanSlots,
    network_scan: extractTarget,
    vulnerability_scan: extractTarget,
    docker: dockerSlots,
    system_status: systemStatusSlots,
    web_search: (text) => slotFrom('query', text, SEARCH_QUERY),
    weather: (text) => slotFrom('city', text, WEATHER_CITY),
    news: (text) => slotFrom('topic', text, NEWS_TOPIC),
    reminder: reminderSlots,
    open_app: (text) => slotFrom('app', text, APP_NAME),
    memory_note: (text) => slotFrom('note', text, NOTE_TEXT),
    memory_recall: (text) => slotFrom('query', text, RECALL_QUERY),
  };
