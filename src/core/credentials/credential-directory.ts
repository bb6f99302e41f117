import { ChatIdentity } from '../interfaces';

/**
 * Bearer credential of a merchant account on the remote API
 */
export type Credential = string;

/**
 * Credential table as loaded at startup: credential -> enrolled identities
 */
export type CredentialTable = ReadonlyMap<Credential, readonly ChatIdentity[]>;

/**
 * Immutable mapping between chat identities and API credentials.
 *
 * Built once at startup and shared by the router (forward lookup) and the
 * webhook fan-out (reverse lookup).
 */
export class CredentialDirectory {
  private readonly byIdentity: ReadonlyMap<ChatIdentity, Credential>;
  private readonly byCredential: ReadonlyMap<Credential, readonly ChatIdentity[]>;

  constructor(table: CredentialTable) {
    const byIdentity = new Map<ChatIdentity, Credential>();
    const byCredential = new Map<Credential, readonly ChatIdentity[]>();

    for (const [credential, identities] of table) {
      byCredential.set(credential, Object.freeze([...identities]));

      for (const identity of identities) {
        // First credential in table order wins
        if (!byIdentity.has(identity)) {
          byIdentity.set(identity, credential);
        }
      }
    }

    this.byIdentity = byIdentity;
    this.byCredential = byCredential;
  }

  static fromObject(raw: Record<string, readonly (string | number)[]>): CredentialDirectory {
    return new CredentialDirectory(
      new Map(
        Object.entries(raw).map(
          ([credential, identities]): [Credential, ChatIdentity[]] => [
            credential,
            identities.map(String),
          ],
        ),
      ),
    );
  }

  static empty(): CredentialDirectory {
    return new CredentialDirectory(new Map());
  }

  credentialFor(identity: ChatIdentity | null | undefined): Credential | undefined {
    if (!identity) {
      return undefined;
    }
    return this.byIdentity.get(identity);
  }

  identitiesFor(credential: Credential): readonly ChatIdentity[] {
    return this.byCredential.get(credential) ?? [];
  }

  /**
   * Number of enrolled credentials
   */
  get size(): number {
    return this.byCredential.size;
  }
}

/**
 * Shorten a credential for log output
 */
export function maskCredential(credential: Credential): string {
  return `${credential.slice(0, 4)}…`;
}
