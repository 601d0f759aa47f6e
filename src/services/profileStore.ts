import type { NewProfileRecord, ProfileRecord } from '../types/session';

export interface ProfileStore {
  put(uid: string, record: NewProfileRecord): Promise<void>;
  queryByPrincipalId(uid: string): Promise<ProfileRecord | null>;
}

// Process-lifetime store used in local-only mode and by tests.
export class InMemoryProfileStore implements ProfileStore {
  private readonly records = new Map<string, ProfileRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async put(uid: string, record: NewProfileRecord): Promise<void> {
    this.records.set(uid, { ...record, uid, createdAt: this.now().toISOString() });
  }

  async queryByPrincipalId(uid: string): Promise<ProfileRecord | null> {
    const found = this.records.get(uid);
    return found ? { ...found } : null;
  }
}
