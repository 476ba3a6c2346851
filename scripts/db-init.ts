/**
 * Ghostline — scripts/db-init.ts
 * WHAT: Creates the SQLite file and every table, then lists what exists.
 * USAGE:
 *   npm run db:init
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { db, closeDatabase } from "../src/db/db.js";
import { listTables } from "../src/db/schema.js";
import { env } from "../src/lib/env.js";

// Importing db already ran ensureCoreSchema
const tables = listTables(db);
console.log(`[db:init] ${env.DB_PATH}: ${tables.join(", ")}`);
closeDatabase();
