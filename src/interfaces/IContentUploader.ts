/**
 * Interface for fetching content into a storage pool by URL
 */
export interface IContentUploader {
  /**
   * Ask the node to download a file into storage; resolves with the task id
   */
  addContent(
    node: string,
    storage: string,
    contentKind: string,
    fileName: string,
    sourceUrl: string
  ): Promise<string>;
}
