/**
 * middleware/index.ts: Barrel export for the request layer.
 */

// ── Fetch layer ─────────────────────────────────────────────
export { lightFetch } from './lightFetcher';
export type { LightFetchRequest, LightFetchResult, RequestFunction } from './lightFetcher';

// ── Body encoding ───────────────────────────────────────────
export { encodeForm, buildMultipartBody, FORM_CONTENT_TYPE } from './formEncoding';
