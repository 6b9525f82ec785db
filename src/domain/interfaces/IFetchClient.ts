/**
 * Header-annotated GET returning the raw body. Retry, timeout and redirect
 * policy belong to the implementation.
 */
export interface IFetchClient {
  /**
   * Fetch the body of `url`, sending exactly `headers`.
   * Rejects with a FetchError on transport failure or a non-2xx status.
   */
  fetchBytes(url: string, headers: Readonly<Record<string, string>>): Promise<Buffer>;
}
