/** Strip ```json fences some models wrap around their output */
function stripFences(content: string): string {
  const trimmed = content.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

/** Parse model output that was asked to be JSON. Throws the JSON.parse SyntaxError otherwise. */
export function parseJsonOutput(content: string): unknown {
  return JSON.parse(stripFences(content));
}
