// src/services/ledger/ContentStore.ts

import { InactiveError, NotFoundError, ValidationError } from '@/lib/api/errors';
import { MAX_COMMENTS, type Comment, type Identity, type Post, type VoteTargetType } from '@/types/models';

/**
 * Entity shared by posts and comments
 */
export type ContentItem = Post | Comment;

export interface Removal {
    removedAt: string;
    removedBy: Identity;
    removedReason?: string;
}

const LABELS: Record<VoteTargetType, string> = {
    post: 'Post',
    comment: 'Comment',
};

/**
 * Dense arena: ids start at 1 and slot i holds id i + 1.
 */
class Arena<T extends { id: number }> {
    private items: T[] = [];

    get size(): number {
        return this.items.length;
    }

    get nextId(): number {
        return this.items.length + 1;
    }

    find(id: number): T | undefined {
        if (!Number.isSafeInteger(id) || id < 1) return undefined;
        return this.items[id - 1];
    }

    push(item: T): T {
        if (item.id !== this.nextId) {
            throw new Error(`Arena id ${item.id} out of sequence, expected ${this.nextId}`);
        }
        this.items.push(item);
        return item;
    }
}

/**
 * Posts, comments and the post -> comment index. Items are never deleted.
 */
export class ContentStore {
    private posts = new Arena<Post>();
    private comments = new Arena<Comment>();

    get totalPosts(): number {
        return this.posts.size;
    }

    get totalComments(): number {
        return this.comments.size;
    }

    findPost(id: number): Post | undefined {
        return this.posts.find(id);
    }

    findComment(id: number): Comment | undefined {
        return this.comments.find(id);
    }

    find(targetType: VoteTargetType, id: number): ContentItem | undefined {
        return targetType === 'post' ? this.findPost(id) : this.findComment(id);
    }

    /**
     * Resolve an item, optionally requiring it to be active
     */
    require(targetType: VoteTargetType, id: number, options: { active: boolean }): ContentItem {
        const item = this.find(targetType, id);
        if (!item) {
            throw new NotFoundError(LABELS[targetType]);
        }
        if (options.active && item.status !== 'active') {
            throw new InactiveError(LABELS[targetType]);
        }
        return item;
    }

    requirePost(id: number, options: { active: boolean }): Post {
        const post = this.findPost(id);
        if (!post) {
            throw new NotFoundError('Post');
        }
        if (options.active && post.status !== 'active') {
            throw new InactiveError('Post');
        }
        return post;
    }

    /**
     * Check that a post can take another comment
     */
    assertCommentCapacity(post: Post): void {
        if (post.commentIds.length >= MAX_COMMENTS) {
            throw new ValidationError('Maximum comments reached for this post', {
                maxComments: MAX_COMMENTS,
            });
        }
    }

    insertPost(author: Identity, content: string, createdAt: string): Post {
        return this.posts.push({
            id: this.posts.nextId,
            author,
            content,
            votes: 0,
            status: 'active',
            commentIds: [],
            createdAt,
        });
    }

    insertComment(post: Post, author: Identity, content: string, createdAt: string): Comment {
        this.assertCommentCapacity(post);
        const comment = this.comments.push({
            id: this.comments.nextId,
            postId: post.id,
            author,
            content,
            votes: 0,
            status: 'active',
            createdAt,
        });
        post.commentIds.push(comment.id);
        return comment;
    }

    applyVote(item: ContentItem, delta: 1 | -1): void {
        item.votes += delta;
    }

    /**
     * One-way: an inactive item is never reactivated
     */
    tombstone(item: ContentItem, removal: Removal): void {
        if (item.status !== 'active') {
            throw new InactiveError(LABELS['postId' in item ? 'comment' : 'post']);
        }
        item.status = 'removed';
        item.removedAt = removal.removedAt;
        item.removedBy = removal.removedBy;
        if (removal.removedReason !== undefined) {
            item.removedReason = removal.removedReason;
        }
    }
}
