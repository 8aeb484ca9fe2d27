export interface StoreDiagnosticsPort {
  readonly databaseName: string | null;
  /** Up to `limit` collection (table) names visible to the service. */
  listCollections(limit: number): Promise<string[]>;
}
