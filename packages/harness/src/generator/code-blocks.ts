/**
 * Code unit extraction from generator responses.
 */

const FENCED_BLOCK = /```(typescript|ts|javascript|js)[^\n]*\n([\s\S]*?)```/g;
const ENTRY_SIGNATURE = 'export async function executeSkill';

export function extractCodeBlocks(response: string): string[] {
  const blocks: string[] = [];
  for (const match of response.matchAll(FENCED_BLOCK)) {
    const body = match[2].trim();
    if (body.length > 0) blocks.push(body);
  }
  return blocks;
}

/**
 * The block that defines the entry point wins; otherwise the first block.
 * Null when the response has no code at all.
 */
export function extractCodeUnit(response: string): string | null {
  const blocks = extractCodeBlocks(response);
  return blocks.find((b) => b.includes(ENTRY_SIGNATURE)) ?? blocks[0] ?? null;
}
