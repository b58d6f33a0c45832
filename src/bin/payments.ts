#!/usr/bin/env node
/**
 * Standalone points payments server.
 *
 * Required environment variables:
 *   REGISTRY_URL         - Agent registry base URL
 *
 * Optional environment variables:
 *   AGENT_ID             - Local agent identifier (default: default)
 *   ANTHROPIC_API_KEY    - Capability oracle credential (default: heuristic)
 *   MONGO_URL            - MongoDB connection string (default: local file)
 *   DB_NAME              - Database name (default: agent_registry)
 *   FACTS_FILE           - File backend path (default: ./agent_facts.json)
 *   PORT                 - Server port (default: 3000)
 *   LOG_LEVEL            - pino log level (default: info)
 */

import 'dotenv/config';
import { createLogger } from '../logger.js';
import { loadConfig } from '../payments/config.js';
import { createQuoteService } from '../payments/engine.js';
import { startPaymentsServer } from '../payments/server.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);
const quotes = await createQuoteService(config, { logger });

startPaymentsServer(config.port, { quotes, logger });
