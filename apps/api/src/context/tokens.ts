export const CLIPBOARD_MANAGER = Symbol('CLIPBOARD_MANAGER');
export const TRUST_STORE = Symbol('TRUST_STORE');
export const URL_OPENER = Symbol('URL_OPENER');
export const PROCESS_LIFECYCLE = Symbol('PROCESS_LIFECYCLE');

export type UrlOpener = (url: string) => Promise<void>;

/** Ends the server process once `/quit` has been answered. */
export interface ProcessLifecycle {
  terminate(): void;
}
