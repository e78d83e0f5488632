import type { ReportEntry, Reporter } from "@/types/context"
import type { EntityKind } from "@/types/errors"

export interface CollectingReporter {
	report: Reporter
	entries: ReportEntry[]
	/** Messages of every entry of `kind`, optionally for one entity kind. */
	messages(kind: ReportEntry["kind"], entityKind?: EntityKind): string[]
	count(kind: ReportEntry["kind"]): number
}

export function collectReports(): CollectingReporter {
	const entries: ReportEntry[] = []
	const matching = (kind: ReportEntry["kind"], entityKind?: EntityKind) =>
		entries.filter(
			(entry) =>
				entry.kind === kind &&
				(entityKind === undefined ||
					("entity" in entry && entry.entity?.kind === entityKind)),
		)

	return {
		count: (kind) => matching(kind).length,
		entries,
		messages: (kind, entityKind) => matching(kind, entityKind).map((entry) => entry.message),
		report: (entry) => {
			entries.push(entry)
		},
	}
}
