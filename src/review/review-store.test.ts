import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileReviewStore, InMemoryReviewStore, parseReviewRecord } from './review-store';
import { ReviewRecord } from '../types';

function makeRecord(overrides: Partial<ReviewRecord> = {}): ReviewRecord {
  return {
    reviewId: 'review-1',
    requestingNode: 'agent-7',
    action: 'apply proposal p1',
    reviewers: ['alice', 'bob', 'carol'],
    decisions: {},
    requiredApprovals: 2,
    status: 'pending',
    ...overrides,
  };
}

describe('FileReviewStore', () => {
  let dir: string;
  let store: FileReviewStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'review-store-'));
    store = new FileReviewStore(path.join(dir, 'reviews'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read back a created record from another instance', async () => {
    await store.create(makeRecord());

    expect(await new FileReviewStore(path.join(dir, 'reviews')).get('review-1')).toEqual(makeRecord());
  });

  it('should refuse to create the same review twice', async () => {
    await store.create(makeRecord());

    await expect(store.create(makeRecord())).rejects.toThrow('EEXIST');
  });

  it('should return null for unknown or malformed ids', async () => {
    expect(await store.get('missing')).toBeNull();
    expect(await store.get('../escape')).toBeNull();
    expect(await store.update('missing', (record) => record)).toBeNull();
  });

  it('should write the changed record', async () => {
    await store.create(makeRecord());

    const updated = await store.update('review-1', (record) => ({
      ...record,
      decisions: { ...record.decisions, alice: 'approve' },
    }));

    expect(updated?.decisions).toEqual({ alice: 'approve' });
    expect((await store.get('review-1'))?.decisions).toEqual({ alice: 'approve' });
    expect(fs.readdirSync(path.join(dir, 'reviews'))).toEqual(['review-1.json']);
  });

  it('should give up when the lock is never released', async () => {
    const impatient = new FileReviewStore(path.join(dir, 'reviews'), { lockRetries: 2, lockRetryDelayMs: 1 });
    await impatient.create(makeRecord());
    fs.writeFileSync(path.join(dir, 'reviews', 'review-1.lock'), 'other\n');

    await expect(impatient.update('review-1', (record) => record)).rejects.toThrow(
      'Review review-1 is locked by another writer'
    );
  });
});

describe('InMemoryReviewStore', () => {
  it('should hand out copies', async () => {
    const store = new InMemoryReviewStore();
    await store.create(makeRecord());

    const record = await store.get('review-1');
    record?.reviewers.push('mallory');

    expect((await store.get('review-1'))?.reviewers).toEqual(['alice', 'bob', 'carol']);
  });
});

describe('parseReviewRecord', () => {
  it('should accept a well-formed record', () => {
    const record = makeRecord({ decisions: { alice: 'approve' } });

    expect(parseReviewRecord(JSON.parse(JSON.stringify(record)), 'review-1')).toEqual(record);
  });

  it('should name the first invalid field', () => {
    expect(() => parseReviewRecord({ ...makeRecord(), decisions: { alice: 'maybe' } }, 'review-1')).toThrow(
      'Corrupt review record review-1: invalid decisions'
    );
    expect(() => parseReviewRecord({ ...makeRecord(), status: 'done' }, 'review-1')).toThrow(
      'Corrupt review record review-1: invalid status'
    );
  });
});
