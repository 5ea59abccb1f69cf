import { randomUUID } from 'node:crypto';
import admin from 'firebase-admin';
import { z } from 'zod';
import { getFirestore } from '../firebase.js';
import type { Rejection } from '../rental/normalize.js';
import { LISTINGS_SOURCES, type Listing, type ListingsSource, type SnapshotRecord } from '../types.js';

// Batched writes are limited to 500 operations, including the snapshot document.
const BATCH_LIMIT = 450;

function omitUndefined<T extends object>(obj: T): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function tsToIso(value: unknown): string {
  if (value instanceof admin.firestore.Timestamp) return value.toDate().toISOString();
  if (typeof value === 'string') return value;
  return '';
}

const sourceSchema = z.enum(LISTINGS_SOURCES);

/** Records one scrape run: its metadata plus the listings it produced. */
export async function saveSnapshot(params: {
  sourceUrl: string;
  source: ListingsSource;
  listings: readonly Listing[];
  rejected: readonly Rejection[];
}): Promise<{ snapshotId: string }> {
  const db = getFirestore();

  const snapshotId = randomUUID();
  const now = admin.firestore.Timestamp.now();
  const snapshotRef = db.collection('snapshots').doc(snapshotId);

  const listingsCol = snapshotRef.collection('listings');
  let batch = db.batch();
  let ops = 0;
  for (const [index, listing] of params.listings.entries()) {
    if (ops >= BATCH_LIMIT) {
      await batch.commit();
      batch = db.batch();
      ops = 0;
    }
    batch.set(listingsCol.doc(String(index).padStart(5, '0')), omitUndefined(listing));
    ops++;
  }

  // Snapshot document goes in the last commit, after every listing chunk.
  batch.set(snapshotRef, {
    sourceUrl: params.sourceUrl,
    source: params.source,
    listingCount: params.listings.length,
    rejectedCount: params.rejected.length,
    rejected: params.rejected.map((r) => ({ index: r.index, reason: r.reason, detail: r.detail })),
    createdAt: now
  });
  await batch.commit();
  return { snapshotId };
}

export async function listRecentSnapshots(limit = 10): Promise<SnapshotRecord[]> {
  const db = getFirestore();
  const snap = await db.collection('snapshots').orderBy('createdAt', 'desc').limit(limit).get();
  const records: SnapshotRecord[] = [];
  for (const d of snap.docs) {
    const source = sourceSchema.safeParse(d.get('source'));
    if (!source.success) {
      console.warn('[snapshot] skipping snapshot with unknown source', { id: d.id, source: d.get('source') });
      continue;
    }
    records.push({
      id: d.id,
      sourceUrl: String(d.get('sourceUrl') ?? ''),
      source: source.data,
      listingCount: Number(d.get('listingCount') ?? 0),
      rejectedCount: Number(d.get('rejectedCount') ?? 0),
      createdAt: tsToIso(d.get('createdAt'))
    });
  }
  return records;
}
