import type { ValidationFinding, ValidationSummary } from '@lorebook/core'

const plural = (count: number, word: string) => `${count} ${word}${count === 1 ? '' : 's'}`

export function formatFinding(finding: ValidationFinding): string {
	return `${finding.severity.toUpperCase()} ${finding.code}: ${finding.message}`
}

export function formatSummary(campaign: string, summary: ValidationSummary): string {
	return `Campaign "${campaign}": ${plural(summary.errors, 'error')}, ${plural(summary.warnings, 'warning')}`
}
