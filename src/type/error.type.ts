/**
 * Site Model Errors
 */

export type SiteModelErrorCode =
  /** A content file path does not lie under the content root. */
  | 'MALFORMED_PATH'
  /** A related link cannot be split into route path and article id. */
  | 'MALFORMED_LINK'
  /** A route path does not exist in the tree. */
  | 'NOT_FOUND'
  /** Internal tree invariant broken. */
  | 'INVARIANT'
  /** Registration attempted after derivation. */
  | 'SEALED';

export class SiteModelError extends Error {
  constructor(
    message: string,
    public readonly code: SiteModelErrorCode,
  ) {
    super(message);
    this.name = 'SiteModelError';
  }
}
