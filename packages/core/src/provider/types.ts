/**
 * Supplies the complete starred listing of a user on a cache miss.
 * The bytes are stored verbatim and only parsed by the search engine.
 */
export interface StarredDatasetProvider {
  fetchStarred(user: string): Promise<Buffer>;
}
