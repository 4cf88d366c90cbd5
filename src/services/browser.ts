import open from 'open';

/**
 * Opens a URL in the user's browser. Rejects when no opener could be
 * launched; callers treat that as non-fatal.
 */
export type BrowserOpener = (url: string) => Promise<void>;

export const openBrowser: BrowserOpener = async (url) => {
  await open(url);
};
