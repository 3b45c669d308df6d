#!/usr/bin/env node
/**
 * SIP Pipeline - CLI Entry Point
 *
 * Usage:
 *   sip-pipeline run package/mets.xml            # after npm install -g
 *   sip-pipeline watch ./incoming
 *   node dist/bin.js run package/mets.xml        # direct invocation
 *
 * @module bin
 */

import { main } from './cli.js';

main().catch((error: unknown) => {
  console.error('[CLI] Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
