/**
 * Converts a rendered document into the archived artifact
 */
export interface ArtifactConverter {
  /**
   * Convert the document at `documentPath` and write the artifact to `artifactPath`
   */
  convert(documentPath: string, artifactPath: string): Promise<void>;

  /**
   * Release the rendering engine, if one was started
   */
  close(): Promise<void>;
}
