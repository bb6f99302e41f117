import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger } from '@nestjs/common';
import {
  CredentialDirectory,
  loadCredentialDirectory,
  maskCredential,
  parseCredentialTable,
} from '../../src';

describe('CredentialDirectory', () => {
  const directory = CredentialDirectory.fromObject({
    'token-alpha': ['100', 200],
    'token-beta': ['300', '100'],
  });

  it('should resolve the credential of an enrolled identity', () => {
    expect(directory.credentialFor('300')).toBe('token-beta');
    expect(directory.credentialFor('200')).toBe('token-alpha');
  });

  it('should give the first credential in table order to an identity enrolled twice', () => {
    expect(directory.credentialFor('100')).toBe('token-alpha');
  });

  it('should return undefined for unknown or absent identities', () => {
    expect(directory.credentialFor('999')).toBeUndefined();
    expect(directory.credentialFor(undefined)).toBeUndefined();
    expect(directory.credentialFor('')).toBeUndefined();
  });

  it('should list identities in enrollment order', () => {
    expect(directory.identitiesFor('token-alpha')).toEqual(['100', '200']);
    expect(directory.identitiesFor('token-beta')).toEqual(['300', '100']);
  });

  it('should return an empty list for an unknown credential', () => {
    expect(directory.identitiesFor('token-unknown')).toEqual([]);
  });

  it('should not be affected by later changes to the source table', () => {
    const identities = ['1'];
    const table = new Map([['token-gamma', identities]]);
    const snapshot = new CredentialDirectory(table);

    identities.push('2');
    table.set('token-delta', ['3']);

    expect(snapshot.identitiesFor('token-gamma')).toEqual(['1']);
    expect(snapshot.credentialFor('3')).toBeUndefined();
    expect(Object.isFrozen(snapshot.identitiesFor('token-gamma'))).toBe(true);
  });

  it('should count enrolled credentials', () => {
    expect(directory.size).toBe(2);
    expect(CredentialDirectory.empty().size).toBe(0);
  });

  it('should mask credentials for logging', () => {
    expect(maskCredential('token-alpha')).toBe('toke…');
  });
});

describe('Credential table loading', () => {
  let warnSpy: jest.SpyInstance;
  let workDir: string;

  beforeEach(() => {
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    workDir = mkdtempSync(join(tmpdir(), 'credentials-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should stringify identities and skip malformed entries', () => {
    const table = parseCredentialTable({
      'token-alpha': [100, '200', null, { id: 3 }],
      'token-beta': 'not-a-list',
    });

    expect([...table.entries()]).toEqual([['token-alpha', ['100', '200']]]);
    expect(warnSpy).toHaveBeenCalledWith(
      'Skipping credential toke…: identity list is not an array',
    );
  });

  it('should yield an empty table for a non-object document', () => {
    expect(parseCredentialTable(['token-alpha']).size).toBe(0);
    expect(warnSpy).toHaveBeenCalledWith(
      'Credential table is not a JSON object; no operator is enrolled',
    );
  });

  it('should load a directory from a JSON file', () => {
    const path = join(workDir, 'api_tokens.json');
    writeFileSync(path, JSON.stringify({ 'token-alpha': [100, 200] }));

    const loaded = loadCredentialDirectory(path);

    expect(loaded.identitiesFor('token-alpha')).toEqual(['100', '200']);
    expect(loaded.credentialFor('200')).toBe('token-alpha');
  });

  it('should fall back to an empty directory when the file is missing', () => {
    const loaded = loadCredentialDirectory(join(workDir, 'missing.json'));

    expect(loaded.size).toBe(0);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should fall back to an empty directory when the file is not JSON', () => {
    const path = join(workDir, 'broken.json');
    writeFileSync(path, '{ not json');

    expect(loadCredentialDirectory(path).size).toBe(0);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});
