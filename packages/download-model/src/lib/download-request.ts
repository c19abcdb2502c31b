import { resolve, type DownloadSelectors } from "./resolver.js";

export interface DownloadRequest {
  readonly rawInput: string;
  readonly destinationDirectory: string;
  readonly authToken?: string;
  /** Computed once from rawInput when the request is created */
  readonly resolvedURL: string;
}

export interface DownloadRequestInit {
  rawInput: string;
  destinationDirectory: string;
  authToken?: string;
  selectors?: DownloadSelectors;
}

/**
 * Build a frozen download request, resolving the input up front.
 *
 * @throws InvalidInputError when rawInput cannot be resolved
 */
export function createDownloadRequest(init: DownloadRequestInit): DownloadRequest {
  const resolvedURL = resolve(init.rawInput, init.selectors);
  return Object.freeze({
    rawInput: init.rawInput,
    destinationDirectory: init.destinationDirectory,
    authToken: init.authToken || undefined,
    resolvedURL,
  });
}
