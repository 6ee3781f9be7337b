export interface ItemSaver {
  save(identity: string, content: Buffer): Promise<void>;
  close(): Promise<void>;
}
