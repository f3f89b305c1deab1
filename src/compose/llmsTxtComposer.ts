import { ComposablePage } from "../types";
import { ComposeOptions, Composer } from "./types";

function pageHeading(page: ComposablePage): string {
  return page.title ? `[${page.title}](${page.url})` : page.url;
}

/** Renders summaries as an `llms.txt` digest, one `##` section per page. */
export class LlmsTxtComposer implements Composer {
  compose(pages: ComposablePage[], options: ComposeOptions = {}): string {
    let output = "";
    if (options.title) {
      output += `# ${options.title}\n\n`;
    }
    if (options.description) {
      output += `> ${options.description}\n\n`;
    }

    for (const page of pages) {
      output += `## ${pageHeading(page)}\n${page.summary}\n\n`;
    }
    return output;
  }
}
