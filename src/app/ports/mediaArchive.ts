export interface MediaArchive {
  save(fileName: string, bytes: Buffer): Promise<string>;
}
