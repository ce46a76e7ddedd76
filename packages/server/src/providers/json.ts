/**
 * Parse a model answer that should be a JSON object. Strips Markdown code
 * fences and any prose around the outermost braces. Returns undefined when
 * nothing parses.
 */
export function parseJsonObject(content: string): unknown {
  let text = content.trim();

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  if (fenced?.[1] !== undefined) {
    text = fenced[1].trim();
  }

  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first === -1 || last <= first) {
    return undefined;
  }

  try {
    const value: unknown = JSON.parse(text.slice(first, last + 1));
    return value;
  } catch {
    return undefined;
  }
}
