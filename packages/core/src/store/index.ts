// Promotion Store - user-confirmed aliases and fix rules across sessions

export { PromotionStore } from "./promotion-store";
export type { StoreOptions, PromoteFixOptions } from "./promotion-store";

export { FileBackend, MemoryBackend } from "./backend";
export type { StorageBackend } from "./backend";

export {
	PromotionDocumentSchema,
	parseDocument,
	serializeDocument,
	emptySnapshot,
} from "./document";
export type { PromotionDocument, PromotionSnapshot } from "./document";
