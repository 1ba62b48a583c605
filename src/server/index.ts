import { createServer } from 'http';
import Database from 'better-sqlite3';
import { createApp } from './app';
import { readConfig } from './config';
import { openDatabase } from './database';

const startServer = async () => {
    const config = await readConfig();

    let db: Database.Database;
    try {
        db = openDatabase(config.databaseUrl);
    } catch (error) {
        throw new Error(`Failed to initialize database at ${config.databaseUrl}`, { cause: error });
    }
    console.log(`[persons] Database ready (${config.databaseUrl})`);

    const server = createServer(createApp(db));

    const shutdown = (signal: string) => {
        console.log(`[persons] ${signal} received, shutting down...`);
        server.close((err) => {
            db.close();
            if (err) {
                console.error('[persons] Error while closing server:', err);
                process.exit(1);
            }
            process.exit(0);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    server.listen(config.port, () => {
        console.log(`[persons] Listening on port ${config.port}`);
    });
    server.on('error', (err) => {
        console.error('[persons] Server error:', err);
        db.close();
        process.exit(1);
    });
};

startServer().catch((err) => {
    console.error('[persons] Failed to start server:', err);
    process.exit(1);
});
