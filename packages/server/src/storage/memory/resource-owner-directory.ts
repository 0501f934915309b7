import type { Principal } from '@grantline/shared';
import { hashSecret, verifySecret } from '../../crypto/index.js';

interface ResourceOwnerRecord {
  username: string;
  passwordHash: string;
  attributes: Record<string, unknown>;
}

/**
 * In-memory resource-owner (user) directory
 * Production deployments verify against their own user system
 */
export class MemoryResourceOwnerDirectory {
  private owners = new Map<string, ResourceOwnerRecord>();

  async register(
    username: string,
    password: string,
    attributes: Record<string, unknown> = {}
  ): Promise<Principal> {
    this.owners.set(username, {
      username,
      passwordHash: await hashSecret(password),
      attributes,
    });
    return { id: username, attributes };
  }

  /**
   * Verify a username/password pair
   */
  async verify(username: string, password: string): Promise<Principal | null> {
    const owner = this.owners.get(username);
    if (!owner) {
      return null;
    }

    const isValid = await verifySecret(password, owner.passwordHash);
    return isValid ? { id: owner.username, attributes: owner.attributes } : null;
  }
}
