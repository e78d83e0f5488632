import { consola } from "consola"
import type { ReportEntry, Reporter } from "@/types/context"

/**
 * Render report entries through consola. Command echoes are debug output,
 * visible with --verbose.
 */
export function createConsolaReporter(): Reporter {
	return (entry: ReportEntry) => {
		switch (entry.kind) {
			case "phase":
				consola.start(entry.message)
				break
			case "present":
			case "changed":
				consola.success(entry.message)
				break
			case "planned":
				consola.info(`[dry-run] ${entry.message}`)
				break
			case "warning":
			case "conflict":
				consola.warn(entry.message)
				break
			case "optional_failure":
				consola.warn(`[optional] ${entry.message}`)
				break
			case "info":
				consola.info(entry.message)
				break
			case "command":
				consola.debug(`$ ${entry.message}`)
				break
		}
	}
}
