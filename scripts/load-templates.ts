/**
 * Load template documents from TEMPLATES_DIR into the database.
 * Templates whose template_id already exists are left untouched.
 *
 * Usage: npm run templates:load [-- <directory>]
 */

import 'dotenv/config';

import { loadConfig } from '../server/config/env';
import { loadTemplateDocuments } from '../server/config/templateDocuments';
import { createDatabase } from '../server/db';
import { DrizzleStorage } from '../server/storage';

async function loadTemplates(): Promise<void> {
  const config = loadConfig();
  const directory = process.argv[2] ?? config.templatesDir;
  const { pool, db } = createDatabase(config);
  const storage = new DrizzleStorage(db);

  try {
    const documents = await loadTemplateDocuments(directory);
    console.log(`Found ${documents.length} template document(s) in ${directory}`);

    let created = 0;
    for (const template of documents) {
      if (await storage.getTemplate(template.templateId)) {
        console.log(`Skipping existing template: ${template.templateId}`);
        continue;
      }
      await storage.createTemplate(template);
      created++;
      console.log(`Created template: ${template.templateId} (${Object.keys(template.columnMappings).length} mappings)`);
    }

    console.log(`Template loading complete: ${created} created, ${documents.length - created} skipped`);
  } finally {
    await pool.end();
  }
}

loadTemplates()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error('Template loading failed:', err);
    process.exit(1);
  });
