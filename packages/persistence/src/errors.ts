export type AbortReason = 'aborted' | 'timeout';

/**
 * The caller gave up (client disconnect, explicit abort) or the deadline
 * passed before the unit of work could commit. The transaction was rolled back.
 */
export class UnitOfWorkAbortedError extends Error {
	constructor(
		readonly reason: AbortReason,
		readonly unitOfWorkId: string,
	) {
		super(
			reason === 'timeout'
				? `Unit of work ${unitOfWorkId} exceeded its deadline`
				: `Unit of work ${unitOfWorkId} was aborted`,
		);
		this.name = 'UnitOfWorkAbortedError';
	}
}

/**
 * An operation was attempted on a unit of work in the wrong lifecycle state,
 * e.g. writing an audit record after commit.
 */
export class UnitOfWorkStateError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'UnitOfWorkStateError';
	}
}
