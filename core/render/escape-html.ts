/** Replacement entities for characters significant in HTML and XML. */
const ENTITIES: Record<string, string> = {
  '"': '&quot;',
  '&': '&amp;',
  "'": '&#39;',
  '<': '&lt;',
  '>': '&gt;',
}

/**
 * Escape text for HTML and XML content and attribute values.
 *
 * @param value - Raw text.
 * @returns Escaped text.
 */
export function escapeHtml(value: string): string {
  return value.replaceAll(/["&'<>]/gu, character => ENTITIES[character] ?? '')
}
