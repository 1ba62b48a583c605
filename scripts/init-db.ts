import { readConfig } from '../src/server/config';
import { openDatabase } from '../src/server/database';

async function initDatabase() {
  const { databaseUrl } = await readConfig();

  // openDatabase provisions the persons table if it is missing
  const db = openDatabase(databaseUrl);
  try {
    const { count } = db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM persons')
      .get() ?? { count: 0 };
    console.log(`Database initialized at ${databaseUrl} (${count} persons)`);
  } finally {
    db.close();
  }
}

initDatabase().catch((error) => {
  console.error('Database initialization failed:', error);
  process.exit(1);
});
