/**
 * Common base for managers that depend on other managers. Dependencies are
 * passed in one object so wiring order stays visible at the composition root.
 */
export abstract class BaseManager<TDeps extends object> {
	constructor(protected readonly managers: TDeps) {}
}
