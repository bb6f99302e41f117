import { readFileSync } from 'fs';
import { Logger } from '@nestjs/common';
import { isRecord } from '../domain/models';
import { ChatIdentity } from '../interfaces';
import {
  Credential,
  CredentialDirectory,
  CredentialTable,
  maskCredential,
} from './credential-directory';

const logger = new Logger('CredentialLoader');

/**
 * Build a credential table from a parsed JSON document of the form
 * { "<credential>": ["<identity>", ...] }.
 *
 * Entries with the wrong shape are skipped; identities are stringified.
 */
export function parseCredentialTable(document: unknown): CredentialTable {
  const table = new Map<Credential, ChatIdentity[]>();

  if (!isRecord(document)) {
    logger.warn('Credential table is not a JSON object; no operator is enrolled');
    return table;
  }

  for (const [credential, identities] of Object.entries(document)) {
    if (!Array.isArray(identities)) {
      logger.warn(
        `Skipping credential ${maskCredential(credential)}: identity list is not an array`,
      );
      continue;
    }

    table.set(
      credential,
      identities
        .filter((identity): identity is string | number =>
          typeof identity === 'string' || typeof identity === 'number',
        )
        .map(String),
    );
  }

  return table;
}

/**
 * Load the credential directory from a JSON file.
 * A missing or unreadable file yields an empty directory.
 */
export function loadCredentialDirectory(filePath: string): CredentialDirectory {
  let document: unknown;

  try {
    document = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logger.warn(
      `Could not read credential table ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return CredentialDirectory.empty();
  }

  const directory = new CredentialDirectory(parseCredentialTable(document));
  logger.log(`Loaded ${directory.size} merchant credential(s) from ${filePath}`);
  return directory;
}
