import { cloneClaim, type Claim } from './claim';

/**
 * Storage port. The engine mutates its own copy of a claim and hands the
 * result back through `save`; durability is up to the implementation.
 */
export interface ClaimRepository {
  findById(id: string): Promise<Claim | undefined>;
  save(claim: Claim): Promise<void>;
  list(): Promise<Claim[]>;
}

export class MemoryClaimRepository implements ClaimRepository {
  private readonly claims = new Map<string, Claim>();

  async findById(id: string): Promise<Claim | undefined> {
    const claim = this.claims.get(id);
    return claim ? cloneClaim(claim) : undefined;
  }

  async save(claim: Claim): Promise<void> {
    this.claims.set(claim.id, cloneClaim(claim));
  }

  async list(): Promise<Claim[]> {
    return [...this.claims.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(cloneClaim);
  }
}
