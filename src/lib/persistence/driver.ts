/**
 * Persistence driver: db | file.
 * PERSISTENCE_DRIVER=db stores sweep reports in PostgreSQL; the default
 * "file" driver keeps them in process memory.
 */

export type PersistenceDriver = "db" | "file";

export function getPersistenceDriver(env: NodeJS.ProcessEnv = process.env): PersistenceDriver {
  const v = env.PERSISTENCE_DRIVER?.toLowerCase();
  if (v === "db") return "db";
  return "file";
}
