/**
 * drizzle-kit configuration, used by `npm run db:push` and `npm run db:studio`.
 *
 * The engine creates its tables itself (src/storage/ddl.ts), so no migration
 * files are generated; push and studio work straight from the schema.
 */
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',
  dialect: 'sqlite',
  dbCredentials: {
    url: process.env.DATABASE_PATH || 'dialogue-director.db',
  },
  strict: true,
});
