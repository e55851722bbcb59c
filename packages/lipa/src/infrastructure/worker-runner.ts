// =============================================================================
// WORKER RUNNER -- Background worker infrastructure for Lipa
// =============================================================================
// Runs background workers (pending-transaction reconciliation) on a polling
// loop. Each worker reschedules itself after it finishes, so runs never
// overlap.

import { ConfigurationError } from "@lipa/core";
import { parseInterval } from "../config/index.js";
import type { LipaContext } from "../context/context.js";
import { reconcilePending } from "../managers/reconcile-pending.js";

export interface LipaWorkerDefinition {
	id: string;
	description: string;
	/** Interval string such as "30s", "5m", "1h". */
	interval: string;
	handler: (ctx: LipaContext) => Promise<void>;
}

// =============================================================================
// JITTER
// =============================================================================

/** Apply ±25% jitter to an interval to prevent thundering herd. */
function withJitter(ms: number): number {
	const jitterFactor = 0.75 + Math.random() * 0.5; // [0.75, 1.25]
	return Math.round(ms * jitterFactor);
}

// =============================================================================
// WORKER RUNNER CLASS
// =============================================================================

interface RunningWorker {
	definition: LipaWorkerDefinition;
	intervalMs: number;
	timer: ReturnType<typeof setTimeout> | null;
	running: boolean;
}

const SHUTDOWN_TIMEOUT_MS = 10_000;

export class LipaWorkerRunner {
	private readonly ctx: LipaContext;
	private readonly workers: RunningWorker[] = [];
	private started = false;
	private stopped = false;

	constructor(ctx: LipaContext) {
		this.ctx = ctx;
	}

	get isRunning(): boolean {
		return this.started && !this.stopped;
	}

	// ---------------------------------------------------------------------------
	// START
	// ---------------------------------------------------------------------------

	start(): void {
		if (this.started) {
			throw new ConfigurationError("Worker runner is already started");
		}
		this.started = true;

		const definitions = buildCoreWorkers(this.ctx);
		if (definitions.length === 0) {
			this.ctx.logger.info("No workers registered");
			return;
		}

		this.ctx.logger.info("Starting worker runner", {
			workerCount: definitions.length,
			workers: definitions.map((w) => w.id),
		});

		for (const definition of definitions) {
			const runningWorker: RunningWorker = {
				definition,
				intervalMs: parseInterval(definition.interval),
				timer: null,
				running: false,
			};
			this.workers.push(runningWorker);
			this.scheduleNext(runningWorker);
		}
	}

	// ---------------------------------------------------------------------------
	// STOP
	// ---------------------------------------------------------------------------

	async stop(): Promise<void> {
		if (this.stopped) return;
		this.stopped = true;

		this.ctx.logger.info("Stopping worker runner");

		for (const worker of this.workers) {
			if (worker.timer !== null) {
				clearTimeout(worker.timer);
				worker.timer = null;
			}
		}

		// Wait for currently running workers to finish (with timeout)
		const runningWorkers = this.workers.filter((w) => w.running);
		if (runningWorkers.length === 0) return;

		this.ctx.logger.info("Waiting for running workers to finish", {
			count: runningWorkers.length,
			workers: runningWorkers.map((w) => w.definition.id),
		});

		let shutdownTimer: ReturnType<typeof setTimeout> | undefined;
		await Promise.race([
			Promise.all(
				runningWorkers.map(
					(w) =>
						new Promise<void>((resolve) => {
							const check = () => {
								if (!w.running) return resolve();
								setTimeout(check, 50);
							};
							check();
						}),
				),
			),
			new Promise<void>((resolve) => {
				shutdownTimer = setTimeout(() => {
					this.ctx.logger.warn("Worker shutdown timed out, proceeding", {
						stillRunning: runningWorkers.filter((w) => w.running).map((w) => w.definition.id),
					});
					resolve();
				}, SHUTDOWN_TIMEOUT_MS);
			}),
		]);
		clearTimeout(shutdownTimer);
	}

	// ---------------------------------------------------------------------------
	// SCHEDULING
	// ---------------------------------------------------------------------------

	private scheduleNext(worker: RunningWorker): void {
		if (this.stopped) return;

		const delay = withJitter(worker.intervalMs);
		worker.timer = setTimeout(() => {
			void this.executeWorker(worker);
		}, delay);
	}

	// ---------------------------------------------------------------------------
	// EXECUTION
	// ---------------------------------------------------------------------------

	private async executeWorker(worker: RunningWorker): Promise<void> {
		if (this.stopped || worker.running) return;

		worker.running = true;
		const { definition } = worker;

		try {
			await definition.handler(this.ctx);
		} catch (error) {
			this.ctx.logger.error("Worker execution failed", {
				workerId: definition.id,
				error: error instanceof Error ? error.message : String(error),
			});
		} finally {
			worker.running = false;
			this.scheduleNext(worker);
		}
	}
}

// =============================================================================
// CORE WORKERS
// =============================================================================

export function buildCoreWorkers(ctx: LipaContext): LipaWorkerDefinition[] {
	const workers: LipaWorkerDefinition[] = [];

	// Pending reconciliation: re-query records still waiting on the gateway
	const reconciliationCfg = ctx.options.workers.reconciliation ?? false;
	if (reconciliationCfg !== false) {
		const interval = typeof reconciliationCfg === "object" ? (reconciliationCfg.interval ?? "5m") : "5m";
		const batchSize = typeof reconciliationCfg === "object" ? (reconciliationCfg.batchSize ?? 100) : 100;
		workers.push({
			id: "core:reconcile-pending",
			description: "Core: reconcile non-terminal transactions with the gateway",
			interval,
			handler: async (workerCtx) => {
				const summary = await reconcilePending(workerCtx, { limit: batchSize });
				if (summary.failed.length > 0) {
					workerCtx.logger.warn("Core: some pending transactions could not be reconciled", {
						failed: summary.failed.map((f) => f.localReference),
					});
				}
			},
		});
	}

	return workers;
}

// =============================================================================
// FACTORY
// =============================================================================

export function createWorkerRunner(ctx: LipaContext): LipaWorkerRunner {
	return new LipaWorkerRunner(ctx);
}
