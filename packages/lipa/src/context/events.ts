// =============================================================================
// NOTIFICATIONS
// =============================================================================
// Subscribers are called after the store write they describe has succeeded.
// They run in parallel; a failing subscriber is logged and never affects the
// others or the operation that triggered it.

import type {
	InconsistencyRecord,
	InconsistencySubscriber,
	LipaLogger,
	StatusChangeEvent,
	StatusChangeSubscriber,
} from "@lipa/core";

export class EventBus {
	private readonly statusSubscribers = new Set<StatusChangeSubscriber>();
	private readonly inconsistencySubscribers = new Set<InconsistencySubscriber>();
	private readonly logger: LipaLogger;

	constructor(
		logger: LipaLogger,
		initial: { subscribers?: StatusChangeSubscriber[]; inconsistencySubscribers?: InconsistencySubscriber[] } = {},
	) {
		this.logger = logger;
		for (const subscriber of initial.subscribers ?? []) this.statusSubscribers.add(subscriber);
		for (const subscriber of initial.inconsistencySubscribers ?? []) this.inconsistencySubscribers.add(subscriber);
	}

	/** Returns a function that removes the subscriber. */
	subscribe(subscriber: StatusChangeSubscriber): () => void {
		this.statusSubscribers.add(subscriber);
		return () => {
			this.statusSubscribers.delete(subscriber);
		};
	}

	onInconsistency(subscriber: InconsistencySubscriber): () => void {
		this.inconsistencySubscribers.add(subscriber);
		return () => {
			this.inconsistencySubscribers.delete(subscriber);
		};
	}

	async emitStatusChange(event: StatusChangeEvent): Promise<void> {
		await this.deliver([...this.statusSubscribers], event, "Status change subscriber failed", {
			localReference: event.localReference,
			newStatus: event.newStatus,
		});
	}

	async emitInconsistency(incident: InconsistencyRecord): Promise<void> {
		await this.deliver([...this.inconsistencySubscribers], incident, "Inconsistency subscriber failed", {
			localReference: incident.localReference,
			incidentId: incident.id,
		});
	}

	private async deliver<E>(
		subscribers: Array<(event: E) => void | Promise<void>>,
		event: E,
		failure: string,
		data: Record<string, unknown>,
	): Promise<void> {
		if (subscribers.length === 0) return;
		await Promise.all(
			subscribers.map(async (subscriber) => {
				try {
					await subscriber(event);
				} catch (err) {
					this.logger.error(failure, { ...data, error: String(err) });
				}
			}),
		);
	}
}
