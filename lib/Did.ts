/**
 * Class containing reusable DID related operations.
 */
export default class Did {
  /** Prefix shared by all `did:web` identifiers. */
  public static readonly webMethodPrefix = 'did:web:';

  /** Domain under which each user's DID document is hosted. */
  public static readonly githubPagesDomain = 'github.io';

  /**
   * Builds the `did:web` identifier of the given GitHub Pages user. e.g. "alice" -> "did:web:alice.github.io"
   * NOTE: the username is used verbatim; it is neither escaped nor checked to be a legal host name.
   */
  public static fromGithubUsername (username: string): string {
    return `${Did.webMethodPrefix}${username}.${Did.githubPagesDomain}`;
  }
}
