/** Turns an HTML document (or a selected fragment of it) into plain Markdown text. */
export interface Extractor {
  readonly name: string;
  extractText(html: string, url: string): string;
}
