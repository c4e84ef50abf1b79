import { defineConfig } from 'drizzle-kit'
import { getPostgresUrl } from './src/config/postgres_cfg.js'

export default defineConfig({
  dialect: 'postgresql',
  schema: './src/db/schema/**/*.ts',
  out: './drizzle',
  dbCredentials: {
    url: getPostgresUrl(),
  },
})
