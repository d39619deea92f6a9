import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { QuorumReviewGraph, quorumPolicyFromTable, reviewStatus } from './review-graph';
import { FileReviewStore } from './review-store';
import { QuorumUndefinedError, ReviewError } from '../types';

const policy = quorumPolicyFromTable({ 1: 1, 3: 2 });

describe('quorumPolicyFromTable', () => {
  it('should return configured thresholds', () => {
    expect(policy(1)).toBe(1);
    expect(policy(3)).toBe(2);
  });

  it('should refuse group sizes that are not configured', () => {
    expect(() => policy(5)).toThrow(QuorumUndefinedError);
    expect(() => policy(2)).toThrow('No quorum threshold configured for a group of 2 reviewer(s)');
  });
});

describe('reviewStatus', () => {
  const base = { reviewId: 'r', requestingNode: 'n', action: 'a', requiredApprovals: 2 };

  it('should stay pending while quorum is still reachable', () => {
    expect(reviewStatus({ ...base, reviewers: ['a', 'b', 'c'], decisions: { a: 'reject' } })).toBe(
      'pending'
    );
  });

  it('should reject once quorum is out of reach', () => {
    expect(
      reviewStatus({ ...base, reviewers: ['a', 'b', 'c'], decisions: { a: 'reject', b: 'reject' } })
    ).toBe('reject');
  });
});

describe('QuorumReviewGraph', () => {
  let graph: QuorumReviewGraph;

  beforeEach(() => {
    graph = new QuorumReviewGraph(policy);
  });

  it('should be quorate after the single reviewer of a 1-of-1 group approves', async () => {
    const reviewId = await graph.requestReview('agent-7', 'proposal p1', ['alice']);

    expect(await graph.isQuorated(reviewId)).toBe(false);
    const record = await graph.answerReview(reviewId, 'alice', 'approve');

    expect(record.status).toBe('approve');
    expect(await graph.isQuorated(reviewId)).toBe(true);
  });

  it('should need two approvals in a 2-of-3 group', async () => {
    const reviewId = await graph.requestReview('agent-7', 'proposal p1', ['alice', 'bob', 'carol']);

    await graph.answerReview(reviewId, 'alice', 'approve');
    expect(await graph.isQuorated(reviewId)).toBe(false);

    await graph.answerReview(reviewId, 'carol', 'approve');
    expect(await graph.isQuorated(reviewId)).toBe(true);
  });

  it('should tolerate one rejection in a 2-of-3 group', async () => {
    const reviewId = await graph.requestReview('agent-7', 'proposal p1', ['alice', 'bob', 'carol']);

    await graph.answerReview(reviewId, 'bob', 'reject');
    await graph.answerReview(reviewId, 'alice', 'approve');
    const record = await graph.answerReview(reviewId, 'carol', 'approve');

    expect(record.status).toBe('approve');
    expect(record.decisions).toEqual({ bob: 'reject', alice: 'approve', carol: 'approve' });
  });

  it('should raise for a group size without a configured quorum', async () => {
    await expect(graph.requestReview('agent-7', 'proposal p1', ['alice', 'bob'])).rejects.toThrow(
      QuorumUndefinedError
    );
  });

  it('should count duplicate reviewer names once', async () => {
    const reviewId = await graph.requestReview('agent-7', 'proposal p1', ['alice', 'alice']);

    expect((await graph.getReview(reviewId))?.reviewers).toEqual(['alice']);
  });

  it('should reject answers from non-members', async () => {
    const reviewId = await graph.requestReview('agent-7', 'proposal p1', ['alice']);

    await expect(graph.answerReview(reviewId, 'mallory', 'approve')).rejects.toThrow(
      `Review ${reviewId}: mallory is not a reviewer`
    );
  });

  it('should reject a second answer from the same reviewer', async () => {
    const reviewId = await graph.requestReview('agent-7', 'proposal p1', ['alice', 'bob', 'carol']);
    await graph.answerReview(reviewId, 'alice', 'approve');

    await expect(graph.answerReview(reviewId, 'alice', 'approve')).rejects.toThrow(ReviewError);
  });

  it('should reject answers for unknown reviews', async () => {
    await expect(graph.answerReview('missing', 'alice', 'approve')).rejects.toThrow(
      'Review missing: not found'
    );
    expect(await graph.getReview('missing')).toBeNull();
    expect(await graph.isQuorated('missing')).toBe(false);
  });

  it('should not expose internal state through returned records', async () => {
    const reviewId = await graph.requestReview('agent-7', 'proposal p1', ['alice']);
    const record = await graph.getReview(reviewId);
    record?.reviewers.push('mallory');

    expect((await graph.getReview(reviewId))?.reviewers).toEqual(['alice']);
  });
});

describe('QuorumReviewGraph over a FileReviewStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'review-graph-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should reach quorum across graph instances', async () => {
    const opened = () => new QuorumReviewGraph(policy, new FileReviewStore(dir));
    const reviewId = await opened().requestReview('agent-7', 'proposal p1', ['alice', 'bob', 'carol']);

    await opened().answerReview(reviewId, 'alice', 'approve');
    expect(await opened().isQuorated(reviewId)).toBe(false);

    const record = await opened().answerReview(reviewId, 'bob', 'approve');
    expect(record.decisions).toEqual({ alice: 'approve', bob: 'approve' });
    expect(await opened().isQuorated(reviewId)).toBe(true);
  });

  it('should keep both of two concurrent answers', async () => {
    const graph = new QuorumReviewGraph(policy, new FileReviewStore(dir));
    const reviewId = await graph.requestReview('agent-7', 'proposal p1', ['alice', 'bob', 'carol']);

    await Promise.all([
      new QuorumReviewGraph(policy, new FileReviewStore(dir)).answerReview(reviewId, 'alice', 'reject'),
      new QuorumReviewGraph(policy, new FileReviewStore(dir)).answerReview(reviewId, 'carol', 'approve'),
    ]);

    expect((await graph.getReview(reviewId))?.decisions).toEqual({ alice: 'reject', carol: 'approve' });
  });

  it('should leave the record unchanged when an answer is refused', async () => {
    const graph = new QuorumReviewGraph(policy, new FileReviewStore(dir));
    const reviewId = await graph.requestReview('agent-7', 'proposal p1', ['alice']);

    await expect(graph.answerReview(reviewId, 'mallory', 'approve')).rejects.toThrow(ReviewError);
    expect((await graph.getReview(reviewId))?.decisions).toEqual({});
    expect(fs.readdirSync(dir)).toEqual([`${reviewId}.json`]);
  });
});
