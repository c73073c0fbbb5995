import 'dotenv/config';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { validateRequiredEnvVars } from '../config/env';
import { closePool, getPool } from '../lib/db';

const SCHEMA_PATH = join(__dirname, '../../db/schema.sql');

async function main(): Promise<void> {
  validateRequiredEnvVars();

  const sql = await readFile(SCHEMA_PATH, 'utf-8');
  await getPool().query(sql);
  console.log(`Schema applied from ${SCHEMA_PATH}`);
}

main()
  .then(() => closePool())
  .then(() => process.exit(0))
  .catch((error) => {
    console.error('Applying schema failed:', error);
    process.exit(1);
  });
