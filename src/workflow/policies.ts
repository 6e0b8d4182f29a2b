import { isFailureStatus, NodeResultStatus } from '../types'

/** Counts over the children of a multi-node after it ran. */
export interface ChildOutcomeSummary {
	/** Declared children. */
	total: number
	/** Children whose status is not `NotRun`. */
	ran: number
	succeeded: number
	failed: number
}

/**
 * Decides whether a multi-node whose children partly failed still counts as
 * `GroupSucceededWithErrors` (`true`) or is `GroupFailed` (`false`).
 */
export type CombinationPolicy = (summary: ChildOutcomeSummary) => boolean

/** Any successful child is enough. The default. */
export const allowPartialSuccess: CombinationPolicy = summary => summary.succeeded > 0

/** A single failed child fails the group. */
export const requireAllSucceeded: CombinationPolicy = () => false

/** Partial success once at least `count` children succeeded. */
export function atLeastSucceeded(count: number): CombinationPolicy {
	return summary => summary.succeeded >= count
}

/** Partial success while no more than `count` children failed. */
export function atMostFailed(count: number): CombinationPolicy {
	return summary => summary.failed <= count
}

/** Partial success when more than half of the children that ran succeeded. */
export const majoritySucceeded: CombinationPolicy = summary => summary.succeeded * 2 > summary.ran

export function summarizeChildren(statuses: readonly NodeResultStatus[]): ChildOutcomeSummary {
	const ran = statuses.filter(status => status !== NodeResultStatus.NotRun)
	const failed = ran.filter(isFailureStatus).length
	return {
		total: statuses.length,
		ran: ran.length,
		succeeded: ran.length - failed,
		failed,
	}
}

/**
 * Combines child statuses into the status of their parent. Children that did
 * not run are ignored; a parent with no child that ran has succeeded.
 */
export function combineChildStatuses(statuses: readonly NodeResultStatus[], policy: CombinationPolicy): NodeResultStatus {
	const summary = summarizeChildren(statuses)

	if (summary.failed === 0) {
		const allClean = statuses.every(status => status === NodeResultStatus.NotRun || status === NodeResultStatus.Succeeded)
		return allClean ? NodeResultStatus.Succeeded : NodeResultStatus.GroupSucceededWithErrors
	}

	if (summary.failed === summary.ran)
		return NodeResultStatus.GroupFailedAllChildNodes

	return policy(summary) ? NodeResultStatus.GroupSucceededWithErrors : NodeResultStatus.GroupFailed
}
