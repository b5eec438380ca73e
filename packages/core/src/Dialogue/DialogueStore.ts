import { LoadError } from '../errors'
import type { DialogueId, NodeId } from '../ids'
import { cloneRecord, deepFreeze } from '../utils'
import type { DialogueNode, DialogueTree } from './types'

interface IndexedTree {
	tree: DialogueTree
	nodes: ReadonlyMap<NodeId, DialogueNode>
}

/**
 * Structural problems that make a tree unusable at runtime: a missing root and
 * nodes whose `id` disagrees with their key.
 */
export function treeStructureIssues(tree: DialogueTree): string[] {
	const issues: string[] = []
	const keys = Object.keys(tree.nodes)

	if (!keys.includes(String(tree.rootNode))) {
		issues.push(`dialogue ${tree.id} root node ${tree.rootNode} does not exist`)
	}

	for (const key of keys) {
		const node = tree.nodes[Number(key)]
		if (String(node.id) !== key) {
			issues.push(`dialogue ${tree.id} node stored under key ${key} has id ${node.id}`)
		}
	}

	return issues
}

function indexNodes(tree: DialogueTree): ReadonlyMap<NodeId, DialogueNode> {
	const nodes = new Map<NodeId, DialogueNode>()
	for (const node of Object.values(tree.nodes)) {
		nodes.set(node.id, node)
	}
	return nodes
}

/**
 * Immutable, validated set of dialogue trees shared by every session.
 */
export class DialogueStore {
	private readonly trees: ReadonlyMap<DialogueId, IndexedTree>

	private constructor(trees: ReadonlyMap<DialogueId, IndexedTree>) {
		this.trees = trees
	}

	public static load(trees: readonly DialogueTree[]): DialogueStore {
		const issues: string[] = []
		const byId = new Map<DialogueId, IndexedTree>()

		for (const tree of trees) {
			if (byId.has(tree.id)) {
				issues.push(`duplicate dialogue id ${tree.id}`)
				continue
			}
			issues.push(...treeStructureIssues(tree))
			const copy = deepFreeze(cloneRecord(tree))
			byId.set(tree.id, { tree: copy, nodes: indexNodes(copy) })
		}

		if (issues.length > 0) {
			throw new LoadError('dialogue', issues)
		}

		return new DialogueStore(byId)
	}

	public getTree(id: DialogueId): DialogueTree | undefined {
		return this.trees.get(id)?.tree
	}

	public getNode(treeId: DialogueId, nodeId: NodeId): DialogueNode | undefined {
		return this.trees.get(treeId)?.nodes.get(nodeId)
	}

	public hasTree(id: DialogueId): boolean {
		return this.trees.has(id)
	}

	public listTrees(): DialogueTree[] {
		return Array.from(this.trees.values(), entry => entry.tree)
	}

	public get size(): number {
		return this.trees.size
	}

	/**
	 * Plain records equal to the ones loaded; feeding them back to `load` yields
	 * the same store.
	 */
	public serialize(): DialogueTree[] {
		return this.listTrees().map(tree => cloneRecord(tree))
	}
}
