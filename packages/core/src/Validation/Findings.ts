import type { FindingCode, FindingLocation, Severity, ValidationFinding } from './types'

export class Findings {
	public readonly list: ValidationFinding[] = []

	public error(code: FindingCode, message: string, location: FindingLocation) {
		this.add('Error', code, message, location)
	}

	public warning(code: FindingCode, message: string, location: FindingLocation) {
		this.add('Warning', code, message, location)
	}

	private add(severity: Severity, code: FindingCode, message: string, location: FindingLocation) {
		this.list.push({ severity, code, message, location: { ...location } })
	}
}
