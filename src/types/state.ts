/**
 * @module types/state
 *
 * Manager status types.
 */

/** Manager state progression: ready → syncing → ready | error */
export type ManagerState = "ready" | "syncing" | "error";

/** Error information structure */
export interface ManagerError {
	/** Error code for programmatic handling */
	code: string;
	/** Human-readable message */
	message: string;
	/** Operation that failed */
	operation: string;
	/** Original error for debugging */
	originalError?: unknown;
}

/** Status wrapper published by every manager's store */
export interface ManagerStatus {
	/** Current manager state */
	state: ManagerState;
	/** Error information when state is "error" */
	error: ManagerError | null;
	/** Timestamp of last successful server round trip */
	lastSyncedAt: number | null;
}
