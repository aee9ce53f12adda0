// src/services/ledger/__tests__/QueryFacade.test.ts

import { InactiveError, NotFoundError, ValidationError } from '@/lib/api/errors';
import { AccessControl } from '../AccessControl';
import { InMemoryActionLog } from '../ActionLog';
import { ContentStore } from '../ContentStore';
import { QueryFacade } from '../QueryFacade';
import { ReputationLedger } from '../ReputationLedger';
import { VoteRecordStore } from '../VoteRecordStore';

const NOW = '2026-01-01T00:00:00.000Z';
const REMOVAL = { removedAt: NOW, removedBy: 'owner' };

describe('QueryFacade', () => {
    let content: ContentStore;
    let votes: VoteRecordStore;
    let reputation: ReputationLedger;
    let access: AccessControl;
    let log: InMemoryActionLog;
    let queries: QueryFacade;

    beforeEach(() => {
        content = new ContentStore();
        votes = new VoteRecordStore();
        reputation = new ReputationLedger(() => NOW);
        access = new AccessControl('owner');
        log = new InMemoryActionLog(() => NOW);
        queries = new QueryFacade(content, votes, reputation, access, log);
    });

    function seedPosts(count: number): void {
        for (let i = 1; i <= count; i++) {
            content.insertPost(`author${i}`, `post ${i}`, NOW);
        }
    }

    describe('feed', () => {
        test('returns active posts in ascending id order', () => {
            seedPosts(5);
            const second = content.findPost(2);
            if (!second) throw new Error('post 2 missing');
            content.tombstone(second, REMOVAL);

            expect(queries.feed(1, 10, null).map((post) => post.id)).toEqual([1, 3, 4, 5]);
            expect(queries.feed(2, 2, null).map((post) => post.id)).toEqual([3]);
        });

        test('a start past the last id is an empty page', () => {
            seedPosts(5);

            expect(queries.feed(1000, 10, 'x')).toEqual([]);
            expect(queries.feed(6, 1, null)).toEqual([]);
        });

        test('rejects out-of-range batch sizes and negative starts', () => {
            seedPosts(1);

            expect(() => queries.feed(1, 0, null)).toThrow(ValidationError);
            expect(() => queries.feed(1, 101, null)).toThrow(ValidationError);
            expect(() => queries.feed(-1, 10, null)).toThrow(ValidationError);
            expect(queries.feed(1, 100, null)).toHaveLength(1);
        });

        test('projects author reputation and the viewer vote', () => {
            seedPosts(2);
            reputation.adjust('author1', 12);
            votes.claim('viewer', 'post', 1, false);

            const [first, second] = queries.feed(1, 2, 'viewer');

            expect(first).toEqual({
                id: 1,
                author: 'author1',
                authorReputation: 12,
                content: 'post 1',
                votes: 0,
                status: 'active',
                commentCount: 0,
                viewerVote: { hasVoted: true, isUpvote: false, hasRevoked: false },
                createdAt: NOW,
            });
            expect(second.authorReputation).toBe(0);
            expect(second.viewerVote).toEqual({ hasVoted: false, isUpvote: false, hasRevoked: false });
        });
    });

    describe('postDetails', () => {
        beforeEach(() => {
            const post = content.insertPost('alice', 'hello', NOW);
            for (let i = 1; i <= 5; i++) {
                content.insertComment(post, 'bob', `comment ${i}`, NOW);
            }
            const removed = content.findComment(2);
            if (!removed) throw new Error('comment 2 missing');
            content.tombstone(removed, REMOVAL);
        });

        test('slices the comment index and skips removed comments', () => {
            const first = queries.postDetails(1, 0, 3, null);
            expect(first.comments.map((comment) => comment.id)).toEqual([1, 3]);
            expect(first.hasMore).toBe(true);
            expect(first.post.commentCount).toBe(5);

            const second = queries.postDetails(1, 3, 3, null);
            expect(second.comments.map((comment) => comment.id)).toEqual([4, 5]);
            expect(second.hasMore).toBe(false);

            const past = queries.postDetails(1, 5, 3, null);
            expect(past.comments).toEqual([]);
            expect(past.hasMore).toBe(false);
        });

        test('a zero batch returns only the post', () => {
            const details = queries.postDetails(1, 0, 0, null);

            expect(details.comments).toEqual([]);
            expect(details.hasMore).toBe(true);
        });

        test('removed posts stay readable', () => {
            const post = content.findPost(1);
            if (!post) throw new Error('post 1 missing');
            content.tombstone(post, REMOVAL);

            expect(queries.postDetails(1, 0, 10, null).post.status).toBe('removed');
        });

        test('unknown posts and bad slices are rejected', () => {
            expect(() => queries.postDetails(2, 0, 10, null)).toThrow(NotFoundError);
            expect(() => queries.postDetails(1, -1, 10, null)).toThrow(ValidationError);
            expect(() => queries.postDetails(1, 0, 101, null)).toThrow(ValidationError);
        });
    });

    describe('commentDetails', () => {
        test('returns removed comments with their status', () => {
            const post = content.insertPost('alice', 'hello', NOW);
            const comment = content.insertComment(post, 'bob', 'hi', NOW);
            content.tombstone(comment, REMOVAL);
            votes.claim('carol', 'comment', 1, true);

            expect(queries.commentDetails(1, 'carol')).toMatchObject({
                id: 1,
                postId: 1,
                status: 'removed',
                viewerVote: { hasVoted: true, isUpvote: true, hasRevoked: false },
            });
            expect(() => queries.commentDetails(2, null)).toThrow(NotFoundError);
        });
    });

    describe('userStats', () => {
        test('unknown identities read as zero', () => {
            expect(queries.userStats('nobody')).toEqual({
                identity: 'nobody',
                reputation: 0,
                isModerator: false,
                postCount: 0,
                commentCount: 0,
            });
            expect(queries.userStats('owner').isModerator).toBe(true);
            expect(() => queries.userStats('')).toThrow(ValidationError);
        });

        test('reports counters from the account', () => {
            reputation.recordPost('alice');
            reputation.recordComment('alice');
            reputation.recordComment('alice');
            reputation.adjust('alice', 20);

            expect(queries.userStats('alice')).toEqual({
                identity: 'alice',
                reputation: 20,
                isModerator: false,
                postCount: 1,
                commentCount: 2,
            });
        });
    });

    describe('totals and actions', () => {
        test('totals count removed items', () => {
            seedPosts(3);
            const post = content.findPost(1);
            if (!post) throw new Error('post 1 missing');
            content.insertComment(post, 'bob', 'hi', NOW);
            content.tombstone(post, REMOVAL);

            expect(queries.totals()).toEqual({ totalPosts: 3, totalComments: 1 });
        });

        test('pages the action log by sequence number', () => {
            for (let i = 1; i <= 4; i++) {
                log.append({
                    kind: 'PostAction',
                    targetType: 'post',
                    itemId: i,
                    actor: 'alice',
                    subject: 'alice',
                    label: 'created',
                    reputation: 10 * i,
                });
            }

            expect(queries.actions(0, 2).map((record) => record.seq)).toEqual([1, 2]);
            expect(queries.actions(2, 50).map((record) => record.seq)).toEqual([3, 4]);
            expect(queries.actions(4, 50)).toEqual([]);
            expect(() => queries.actions(0, 0)).toThrow(ValidationError);
            expect(() => queries.actions(-1, 10)).toThrow(ValidationError);
        });
    });

    test('queries never throw InactiveError', () => {
        seedPosts(1);
        const post = content.findPost(1);
        if (!post) throw new Error('post 1 missing');
        content.tombstone(post, REMOVAL);

        expect(() => queries.postDetails(1, 0, 1, null)).not.toThrow(InactiveError);
        expect(queries.feed(1, 1, null)).toEqual([]);
    });
});
