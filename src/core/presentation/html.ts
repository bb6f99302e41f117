const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/**
 * Escape text for Telegram HTML parse mode
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Render an untyped API value as display text (unescaped)
 */
export function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return '';
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Render and escape an API value, substituting a placeholder when absent
 */
export function show(value: unknown, placeholder = '—'): string {
  if (value === undefined || value === null) {
    return placeholder;
  }
  return escapeHtml(toText(value));
}
