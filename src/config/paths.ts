import path from 'path';

/**
 * Centralized path configuration for the RAG cache
 * RAG_CACHE_DIR overrides the default `<cwd>/rag_cache`
 */
export function getCacheRoot(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.RAG_CACHE_DIR?.trim();
  return override ? path.resolve(override) : path.join(process.cwd(), 'rag_cache');
}

export function getStoreFile(cacheRoot: string): string {
  return path.join(cacheRoot, 'passage-store.json');
}

export function getAudioDir(cacheRoot: string): string {
  return path.join(cacheRoot, 'audio');
}
