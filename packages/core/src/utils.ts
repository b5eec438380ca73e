import type { Position } from './types'

/**
 * JSON-shaped deep copy. Records handled here are plain data, so nothing is lost.
 */
export function cloneRecord<T>(value: T): T {
	return JSON.parse(JSON.stringify(value))
}

export function deepFreeze<T>(value: T): T {
	if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value)
		for (const child of Object.values(value)) {
			deepFreeze(child)
		}
	}
	return value
}

/**
 * Calculate Euclidean distance between two positions
 */
export function calculateDistance(pos1: Position, pos2: Position): number {
	const dx = pos1.x - pos2.x
	const dy = pos1.y - pos2.y
	return Math.sqrt(dx * dx + dy * dy)
}

/**
 * The `type` tag of a record that fell through an exhaustive switch.
 */
export function describeVariant(value: unknown): string {
	if (typeof value === 'object' && value !== null && 'type' in value) {
		return String(value.type)
	}
	return typeof value
}
