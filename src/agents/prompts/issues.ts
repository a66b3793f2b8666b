/** Render a bulleted section, or nothing when there are no items */
export function formatIssues(title: string, items: readonly string[]): string {
  if (items.length === 0) return '';
  return `\n### ${title.toUpperCase()}\n${items.map((item) => `- ${item}`).join('\n')}\n`;
}
