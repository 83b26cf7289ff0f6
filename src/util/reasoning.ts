const THINK_BLOCK = /<think>[\s\S]*?<\/think>\n?/g;

/** Removes `<think>…</think>` reasoning blocks emitted by reasoning models. */
export function stripReasoning(text: string): string {
  return text.replace(THINK_BLOCK, '');
}
