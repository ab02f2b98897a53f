#!/usr/bin/env node
/**
 * Circuit Tutor MCP Server - CLI Entry Point
 *
 * Usage:
 *   npx circuit-tutor-mcp              # via npx
 *   circuit-tutor-mcp                  # after npm install -g
 *   node dist/index.js                 # direct invocation
 *
 * @module bin
 */

import './index.js';
