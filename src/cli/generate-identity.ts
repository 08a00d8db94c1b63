#!/usr/bin/env node
/**
 * Identity generation CLI.
 *
 * Generates the X25519 keypair a client registers with the key server and
 * saves it with correct file permissions (0600 private, 0644 public).
 *
 * Usage:
 *   generate-identity                 # <configDir>/identity
 *   generate-identity --dir <path>    # custom directory
 *   generate-identity show <path>     # print fingerprint of an existing identity
 */

import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';

import { getConfigDir, loadConfig } from '../shared/config.js';
import {
  generateIdentity,
  identityExists,
  loadIdentity,
  fingerprint,
  saveIdentity,
  PUBLIC_KEY_FILE,
  PRIVATE_KEY_FILE,
} from '../shared/crypto/index.js';

function usage(): void {
  console.log(`
Ember key server identity generation

Usage:
  generate-identity                Generate a client identity in the configured identityDir
  generate-identity --dir <path>   Generate an identity in a custom directory
  generate-identity show <path>    Show the fingerprint of an existing identity

Keys are saved as PEM files:
  <dir>/${PUBLIC_KEY_FILE}    X25519 public key (registered with the server)
  <dir>/${PRIVATE_KEY_FILE}    X25519 private key (keep secret!)
`);
}

function generateAndSave(targetDir: string): void {
  if (identityExists(targetDir)) {
    console.error(`\n⚠️  An identity already exists in ${targetDir}`);
    console.error('   Delete it first if you want to regenerate.');
    const existing = loadIdentity(targetDir);
    console.log(`\n   Existing fingerprint: ${fingerprint(existing.publicKey)}\n`);
    process.exit(1);
  }

  console.log('\nGenerating identity keypair...');
  const identity = generateIdentity();
  saveIdentity(identity, targetDir);

  console.log(`\n✓ Identity saved to: ${targetDir}`);
  console.log(`  Fingerprint: ${fingerprint(identity.publicKey)}`);
  console.log(`    ${path.join(targetDir, PUBLIC_KEY_FILE)}    (public)`);
  console.log(`    ${path.join(targetDir, PRIVATE_KEY_FILE)}    (PRIVATE, protect this)`);
  console.log('');
}

// ── Main ───────────────────────────────────────────────────────────────────

const args = process.argv.slice(2);

if (args.includes('--help') || args.includes('-h')) {
  usage();
  process.exit(0);
}

if (args.length === 0) {
  fs.mkdirSync(getConfigDir(), { recursive: true, mode: 0o700 });
  generateAndSave(loadConfig().client.identityDir);
} else if (args[0] === '--dir' && args[1]) {
  generateAndSave(args[1]);
} else if (args[0] === 'show' && args[1]) {
  console.log(`Fingerprint: ${fingerprint(loadIdentity(args[1]).publicKey)}`);
} else {
  console.error(`Unknown argument: ${args[0]}`);
  usage();
  process.exit(1);
}
