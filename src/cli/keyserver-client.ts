#!/usr/bin/env node
/**
 * Command-line client for the key server.
 *
 * Usage:
 *   keyserver-client register <name>   Claim <name> for the configured identity
 *   keyserver-client lookup <name>     Print the public key registered under <name>
 */

import 'dotenv/config';

import { KeyServerClient } from '../client/client.js';
import { loadConfig } from '../shared/config.js';
import { fingerprint, loadIdentity, publicKeyToHex } from '../shared/crypto/index.js';

function usage(): void {
  console.log(`
Usage:
  keyserver-client register <name>   Claim <name> for the configured identity
  keyserver-client lookup <name>     Print the public key registered under <name>
`);
}

async function main(args: string[]): Promise<number> {
  const [command, name] = args;
  if (!command || !name) {
    usage();
    return command === '--help' || command === '-h' ? 0 : 1;
  }

  const config = loadConfig().client;
  const client = new KeyServerClient({
    serverUrl: config.serverUrl,
    requestTimeout: config.requestTimeout,
  });

  if (command === 'register') {
    const identity = loadIdentity(config.identityDir);
    const outcome = await client.register(name, identity);
    switch (outcome) {
      case 'registered':
        console.log(`✓ Registered "${name}" (${fingerprint(identity.publicKey)})`);
        return 0;
      case 'name_taken':
        console.error(`"${name}" is already taken`);
        return 1;
      case 'failed_challenge':
        console.error('The server rejected the challenge response');
        return 1;
    }
  }

  if (command === 'lookup') {
    const key = await client.lookup(name);
    if (!key) {
      console.error(`No key registered for "${name}"`);
      return 1;
    }
    console.log(publicKeyToHex(key));
    console.log(`Fingerprint: ${fingerprint(key)}`);
    return 0;
  }

  console.error(`Unknown command: ${command}`);
  usage();
  return 1;
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exit(1);
  },
);
