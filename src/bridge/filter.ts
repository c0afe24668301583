/**
 * Strip the bot's names and mention markup from message text
 */
export function filterContent(content: string, names: readonly string[]): string {
  let output = content;
  for (const name of names) {
    if (name) output = output.replaceAll(name, '');
  }
  return output.replace(/[<>&@]/g, '').trim();
}
