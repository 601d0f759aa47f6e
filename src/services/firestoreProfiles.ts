import {
  collection,
  doc,
  getDocs,
  limit,
  query,
  serverTimestamp,
  setDoc,
  where,
  type DocumentData,
  type Firestore,
} from 'firebase/firestore';
import type { NewProfileRecord, ProfileRecord } from '../types/session';
import type { ProfileStore } from './profileStore';

export const DEFAULT_PROFILES_COLLECTION = 'users';

const asString = (value: unknown, fallback: string) =>
  typeof value === 'string' ? value : fallback;

const toIsoTimestamp = (value: unknown): string | null => {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && 'toDate' in value) {
    const { toDate } = value;
    if (typeof toDate !== 'function') return null;
    const date: unknown = toDate.call(value);
    return date instanceof Date && !Number.isNaN(date.getTime()) ? date.toISOString() : null;
  }
  return null;
};

export const decodeProfile = (uid: string, data: DocumentData): ProfileRecord => ({
  uid: asString(data.uid, uid),
  email: asString(data.email, ''),
  username: asString(data.username, ''),
  createdAt: toIsoTimestamp(data.createdAt),
});

/**
 * Profiles as documents keyed by uid. Reads query on the `uid` field rather
 * than the document id so records written by older clients are still found.
 */
export class FirestoreProfileStore implements ProfileStore {
  constructor(
    private readonly db: Firestore,
    private readonly collectionName: string = DEFAULT_PROFILES_COLLECTION
  ) {}

  async put(uid: string, record: NewProfileRecord): Promise<void> {
    await setDoc(doc(this.db, this.collectionName, uid), {
      uid,
      email: record.email,
      username: record.username,
      createdAt: serverTimestamp(),
    });
  }

  async queryByPrincipalId(uid: string): Promise<ProfileRecord | null> {
    const snap = await getDocs(
      query(collection(this.db, this.collectionName), where('uid', '==', uid), limit(1))
    );
    const [first] = snap.docs;
    if (!first) return null;
    return decodeProfile(uid, first.data());
  }
}
