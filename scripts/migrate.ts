/**
 * Applies pending migrations to the host taxonomy database
 *
 * Usage:
 *   HOST_DB_PATH=data/insect_taxonomy.db npm run migrate
 */

import "dotenv/config";
import { runMigrations } from "@/db";
import * as logger from "@/logger";

try {
  runMigrations();
} catch (error) {
  logger.error("Migration failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
}
