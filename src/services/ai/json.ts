/**
 * Models wrap JSON in prose or code fences; take the outermost object or array.
 */
export function extractJson(text: string, kind: 'object' | 'array' = 'object'): unknown {
  const [open, close] = kind === 'object' ? ['{', '}'] : ['[', ']'];
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);

  if (start === -1 || end <= start) {
    return null;
  }

  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
}

export function stripMarkdown(text: string): string {
  return text
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/\*([^*]+)\*/g, '$1')
    .replace(/`([^`]+)`/g, '$1')
    .replace(/^#+\s*/gm, '')
    .replace(/^[-*]\s+/gm, '- ')
    .trim();
}
