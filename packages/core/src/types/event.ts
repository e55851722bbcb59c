import type { GatewayTransaction, TransactionKind, TransactionStatus } from "./transaction.js";

export interface StatusChangeEvent {
	kind: TransactionKind;
	localReference: string;
	/** `null` when the record was just created. */
	oldStatus: TransactionStatus | null;
	newStatus: TransactionStatus;
	record: GatewayTransaction;
	created: boolean;
}

export type StatusChangeSubscriber = (event: StatusChangeEvent) => void | Promise<void>;

/** Recorded when the gateway reports a status that would break a terminal record. */
export interface InconsistencyRecord {
	id: string;
	kind: TransactionKind;
	localReference: string;
	currentStatus: TransactionStatus;
	reportedStatus: string;
	source: "reconciliation" | "webhook";
	detectedAt: string;
}

export type InconsistencySubscriber = (incident: InconsistencyRecord) => void | Promise<void>;
