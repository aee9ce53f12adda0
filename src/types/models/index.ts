// src/types/models/index.ts

// Account models
export type { Account, Identity, UserStats } from './Account';
export { DEFAULT_ACCOUNT, MIN_REP, MAX_REP, REPUTATION_DELTAS } from './Account';

// Post models
export type { Post, PostView, PostDetails, ContentStatus } from './Post';
export { MAX_POST_BYTES, MAX_COMMENTS } from './Post';

// Comment models
export type { Comment, CommentView } from './Comment';
export { MAX_COMMENT_BYTES } from './Comment';

// Vote models
export type { VoteRecord, VoteState, VoteValue, VoteTargetType } from './Vote';
export { EMPTY_VOTE_RECORD, getVoteId, getVoteState } from './Vote';

// Action models
export type { ActionRecord, ActionInput, ActionKind } from './Action';
