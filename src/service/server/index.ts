/**
 * Express API server
 */
import dotenv from 'dotenv';
dotenv.config();

import { loadServiceConfig } from '../../../shared/config/env.js';
import { errorMessage } from '../../../shared/lib/errors.js';
import { createQueryServices } from '../services.js';
import { createApp } from './app.js';

function main(): void {
    const config = loadServiceConfig(process.env);
    const services = createQueryServices(config);
    const app = createApp(services);

    app.listen(config.server.port, () => {
        console.log(`
🚀 API Server is running!
━━━━━━━━━━━━━━━━━━━━━━━━━━━
📍 URL: http://localhost:${config.server.port}
📦 Index: ${services.indexCache.status().source}
📋 Endpoints:
   GET  /api/health   - server and index status
   POST /api/ask      - ask about the repository catalog
━━━━━━━━━━━━━━━━━━━━━━━━━━━
`);
    });
}

try {
    main();
} catch (error) {
    console.error(`❌ Failed to start API server: ${errorMessage(error)}`);
    process.exit(1);
}
