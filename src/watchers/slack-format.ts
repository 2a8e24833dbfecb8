const MARKDOWN_LINK = /\[([^\]]+)\]\(([^)]+)\)/g;

/** Rewrite Markdown links `[label](url)` as Slack links `<url|label>`. */
export function markdownToSlack(text: string): string {
  return text.replace(MARKDOWN_LINK, (_match, label: string, url: string) => `<${url}|${label}>`);
}
