/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app, session gate, flash messages and route handlers
 * - services/: validation, password hashing, session tokens, support replies
 * - clients/: external service clients (CompletionClient)
 * - storage/: SQLite database and the user/entry stores
 *
 * When run directly, this file loads the configuration, opens the database
 * and starts the server. Any failure on the way is fatal.
 * When imported, it exports the server factory functions.
 */

import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import { createServer } from './server';
import { openDatabase } from './storage';

// Re-export server components
export {
    createApp,
    createServer,
    startServer,
    ApiError,
    DEFAULT_SERVER_CONFIG,
} from './server';

export type { ServerConfig, ServerOptions } from './server';

export { loadConfig, resolveDatabasePath, ConfigError } from './config';

export type { AppConfig } from './config';

// Re-export services
export * from './services';

// Re-export storage
export * from './storage';

// Re-export clients
export * from './clients';

/**
 * Loads configuration, opens the database and starts listening.
 * Closes the server and the database on SIGINT/SIGTERM.
 */
async function main(): Promise<void> {
    dotenv.config();
    const config = loadConfig();
    const database = openDatabase(config.databasePath);

    const { server } = await createServer(
        {
            port: config.port,
            secretKey: config.secretKey,
            database,
            sessionTtlSeconds: config.sessionTtlSeconds,
            secureCookies: config.secureCookies,
            bcryptRounds: config.bcryptRounds,
            completion: config.completion,
        },
        true
    );

    const shutdown = (signal: NodeJS.Signals): void => {
        console.log(`Received ${signal}, shutting down`);
        if (!server) {
            database.close();
            process.exit(0);
        }
        server.close((error) => {
            database.close();
            if (error) {
                console.error('Error while closing the server:', error);
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

// Main entry point - start server when run directly
if (require.main === module) {
    main().catch((error: Error) => {
        console.error('Failed to start server:', error);
        process.exit(1);
    });
}
