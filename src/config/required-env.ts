export const INGESTION_REQUIRED_ENV = ['NEWS_API_KEY', 'PINECONE_API_KEY'];

export function findMissingEnv(
  names: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  return names.filter((name) => !env[name] || !env[name]?.trim());
}

