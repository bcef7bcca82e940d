import { defineConfig } from "drizzle-kit";

/**
 * Drizzle Kit Configuration
 *
 * Migrations are generated from shared/schema.ts into ./migrations.
 */

const databaseUrl = process.env.DATABASE_URL;

if (!databaseUrl) {
  throw new Error("DATABASE_URL must be set to run drizzle-kit.");
}

export default defineConfig({
  out: "./migrations",
  schema: "./shared/schema.ts",
  dialect: "postgresql",
  dbCredentials: {
    url: databaseUrl,
  },
});
