import type { ArticlePage, PollWindow } from '../types/article';

// A finite, restartable sequence of raw article pages for one poll window.
// Every call to `fetch` starts again from the first page.
export interface FetchSource {
  fetch(window: PollWindow): AsyncIterable<ArticlePage>;
}
