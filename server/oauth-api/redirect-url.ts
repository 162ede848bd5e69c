/**
 * Query parameter added to the post-login URL when the user did not grant access
 */
export const ERROR_QUERY_NAME = 'error_code';

export const ACCESS_DENIED = 'access_denied';

/**
 * Append `error_code=access_denied` to a post-login URL.
 *
 * The URL's existing query is re-serialized, which percent-encodes characters
 * such as `{` and `}` that show up when a query value carries JSON. Relative
 * URLs are resolved against the broker base URL.
 */
export function appendErrorCode(redirectUrl: string, baseUrl: string, errorCode: string = ACCESS_DENIED): string {
  const url = new URL(redirectUrl, `${baseUrl}/`);
  url.searchParams.append(ERROR_QUERY_NAME, errorCode);
  return url.toString();
}
