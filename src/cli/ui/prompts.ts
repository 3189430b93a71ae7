/**
 * Interactive prompts
 */

import * as p from "@clack/prompts";

/**
 * Ask before a destructive action. Defaults to "no"; Ctrl-C counts as no.
 */
export async function confirmAction(message: string): Promise<boolean> {
  const answer = await p.confirm({ message, initialValue: false });
  return !p.isCancel(answer) && answer;
}
