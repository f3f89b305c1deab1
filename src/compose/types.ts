import { ComposablePage } from "../types";

export interface ComposeOptions {
  title?: string;
  description?: string;
}

export interface Composer {
  compose(pages: ComposablePage[], options?: ComposeOptions): string;
}
