import { defineConfig } from 'drizzle-kit';
import { config } from 'dotenv';
import { resolve } from 'path';

config({ path: resolve(process.cwd(), '.env') });

const url = process.env.DATABASE_URL;
if (!url) {
  throw new Error('DATABASE_URL is required to run drizzle-kit');
}

export default defineConfig({
  schema: './packages/shared/src/db/schema.ts',
  out: './packages/shared/drizzle',
  dialect: 'postgresql',
  dbCredentials: { url },
});
