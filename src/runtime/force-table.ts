interface ForcedValue {
  value: unknown;
  // Sequence of the FORCE_SET that last wrote this name; resolves overlaps between owners.
  seq: number;
}

interface ForceOwnerState {
  connectionId: string;
  values: Map<string, ForcedValue>;
}

export interface ForceRecord {
  owner_id: string;
  name: string;
  value: unknown;
}

export interface ForceClearInput {
  names?: readonly string[];
  all?: boolean;
}

/**
 * Debug overrides grouped by owner. Every owner present here has at least one
 * forced name and appears in exactly one connection's owner set.
 */
export class ForceTable {
  private readonly owners = new Map<string, ForceOwnerState>();
  private readonly ownerIdsByConnectionId = new Map<string, Set<string>>();
  private nextSeq = 1;

  set(ownerId: string, connectionId: string, values: Readonly<Record<string, unknown>>): void {
    const entries = Object.entries(values);
    let owner = this.owners.get(ownerId);
    if (owner === undefined) {
      if (entries.length === 0) {
        return;
      }
      owner = {
        connectionId,
        values: new Map<string, ForcedValue>(),
      };
      this.owners.set(ownerId, owner);
    } else if (owner.connectionId !== connectionId) {
      this.unlinkOwner(ownerId, owner.connectionId);
      owner.connectionId = connectionId;
    }
    this.linkOwner(ownerId, connectionId);

    const seq = this.nextSeq;
    this.nextSeq += 1;
    for (const [name, value] of entries) {
      owner.values.set(name, {
        value,
        seq,
      });
    }
  }

  clear(ownerId: string, input: ForceClearInput = {}): void {
    const owner = this.owners.get(ownerId);
    if (owner === undefined) {
      return;
    }
    const names = input.names ?? [];
    if (input.all === true || names.length === 0) {
      this.removeOwner(ownerId, owner);
      return;
    }
    for (const name of names) {
      owner.values.delete(name);
    }
    if (owner.values.size === 0) {
      this.removeOwner(ownerId, owner);
    }
  }

  clearByConnection(connectionId: string): number {
    const ownerIds = this.ownerIdsByConnectionId.get(connectionId);
    if (ownerIds === undefined) {
      return 0;
    }
    for (const ownerId of ownerIds) {
      this.owners.delete(ownerId);
    }
    this.ownerIdsByConnectionId.delete(connectionId);
    return ownerIds.size;
  }

  /**
   * Effective forced value for `name`: the most recent FORCE_SET across all
   * owners wins.
   */
  lookup(name: string): { forced: true; value: unknown } | { forced: false } {
    let winner: ForcedValue | null = null;
    for (const owner of this.owners.values()) {
      const candidate = owner.values.get(name);
      if (candidate !== undefined && (winner === null || candidate.seq > winner.seq)) {
        winner = candidate;
      }
    }
    if (winner === null) {
      return { forced: false };
    }
    return {
      forced: true,
      value: winner.value,
    };
  }

  snapshot(): ForceRecord[] {
    const records: ForceRecord[] = [];
    for (const [ownerId, owner] of this.owners) {
      for (const [name, forced] of owner.values) {
        records.push({
          owner_id: ownerId,
          name,
          value: forced.value,
        });
      }
    }
    return records;
  }

  ownerCount(): number {
    return this.owners.size;
  }

  ownerIdsForConnection(connectionId: string): readonly string[] {
    return [...(this.ownerIdsByConnectionId.get(connectionId) ?? [])];
  }

  private removeOwner(ownerId: string, owner: ForceOwnerState): void {
    this.owners.delete(ownerId);
    this.unlinkOwner(ownerId, owner.connectionId);
  }

  private linkOwner(ownerId: string, connectionId: string): void {
    const ownerIds = this.ownerIdsByConnectionId.get(connectionId);
    if (ownerIds === undefined) {
      this.ownerIdsByConnectionId.set(connectionId, new Set([ownerId]));
      return;
    }
    ownerIds.add(ownerId);
  }

  private unlinkOwner(ownerId: string, connectionId: string): void {
    const ownerIds = this.ownerIdsByConnectionId.get(connectionId);
    if (ownerIds === undefined) {
      return;
    }
    ownerIds.delete(ownerId);
    if (ownerIds.size === 0) {
      this.ownerIdsByConnectionId.delete(connectionId);
    }
  }
}
