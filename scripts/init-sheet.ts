/**
 * Creates an empty sign-up workbook with the expected headers.
 *
 *   npm run init-sheet            # uses EXCEL_PATH
 *   npm run init-sheet -- out.xlsx
 */
import { existsSync } from 'fs';
import { getEnv } from '../apps/server/src/lib/env.js';
import { createSignupWorkbook } from '../apps/server/src/lib/workbookTemplate.js';

async function initSheet() {
  const env = getEnv();
  const path = process.argv[2] ?? env.EXCEL_PATH;

  if (existsSync(path)) {
    console.error(`❌ ${path} already exists, not overwriting`);
    process.exit(1);
  }

  await createSignupWorkbook(path, {
    sheetName: env.SHEET_NAME,
    headerRow: env.HEADER_ROW,
    title: `${env.ORG_NAME} Volunteer Sign Up Sheet`,
  });
  console.log(`✅ Created ${path} (sheet "${env.SHEET_NAME}", headers on row ${env.HEADER_ROW})`);
}

initSheet().catch((e) => {
  console.error('❌ Failed to create sign-up sheet:', e);
  process.exit(1);
});
