/**
 * External collaborator interface
 * Everything that touches the network, the filesystem or an external program
 * is reached through this bundle, so passes stay testable in process
 */

export interface ArtifactHandle {
  href: string; // file:// URL of the stored asset
}

/**
 * Options parsed from a code block header, e.g. ":lang: ruby".
 * Options given without a value are `true`.
 */
export type CodeOptions = Record<string, string | true>;

export interface Collaborators {
  /** Fetch a remote resource; rejects on network errors and non-2xx responses */
  fetchResource(url: string): Promise<Buffer>;
  /** Store image bytes at an asset location (relative to the asset directory) */
  storeImage(location: string, data: Buffer): Promise<ArtifactHandle>;
  /** Compile a LaTeX fragment into a PDF at an asset location (without extension) */
  compileMath(
    source: string,
    displayMode: boolean,
    location: string,
  ): Promise<ArtifactHandle>;
  /** Highlight source code, returning markup made of text and hl_* elements */
  highlightCode(source: string, options: CodeOptions): string;
}
