/**
 * Hierarchical, name-deduplicated storage for archived artifacts
 */
export interface ArchiveStore {
  /**
   * Find a folder by exact name under `parentId` (the store root when omitted),
   * creating it when absent
   */
  ensureFolder(name: string, parentId?: string): Promise<string>;

  /**
   * Whether a file with this exact name exists directly inside the folder
   */
  exists(name: string, parentId: string): Promise<boolean>;

  /**
   * Upload a local artifact into the folder
   * @returns The new file's id
   */
  upload(filePath: string, name: string, parentId: string): Promise<string>;

  /**
   * Names (without extension) of every artifact archived for a guild
   */
  listArchivedChannels(guildName: string): Promise<Set<string>>;
}
