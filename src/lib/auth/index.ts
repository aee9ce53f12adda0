// src/lib/auth/index.ts

export { verifyToken } from './verifyToken';
export type { VerifiedCaller } from './verifyToken';
