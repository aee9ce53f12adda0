// src/services/actions/index.ts

export { FirestoreActionMirror } from './FirestoreActionMirror';
export type { MirrorTarget } from './FirestoreActionMirror';
