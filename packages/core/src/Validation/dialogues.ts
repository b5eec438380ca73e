import type { DialogueNode, DialogueTree } from '../Dialogue/types'
import type { DialogueId, NodeId } from '../ids'
import { checkActions, checkConditions, isGateClosed } from './references'
import type { CheckContext } from './references'

function nodeIndex(tree: DialogueTree): Map<NodeId, DialogueNode> {
	const nodes = new Map<NodeId, DialogueNode>()
	for (const [key, node] of Object.entries(tree.nodes)) {
		nodes.set(Number(key), node)
	}
	return nodes
}

/**
 * Nodes reachable from the root. Choices that end the dialogue lead nowhere;
 * `follow` decides whether any other choice edge may be taken.
 */
function reachable(
	tree: DialogueTree,
	nodes: ReadonlyMap<NodeId, DialogueNode>,
	follow: (from: DialogueNode, choiceIndex: number, target: DialogueNode) => boolean
): Set<NodeId> {
	const seen = new Set<NodeId>()
	if (!nodes.has(tree.rootNode)) return seen

	const queue: NodeId[] = [tree.rootNode]
	seen.add(tree.rootNode)

	while (queue.length > 0) {
		const id = queue.shift()
		const node = id === undefined ? undefined : nodes.get(id)
		if (!node || node.isTerminal) continue

		node.choices.forEach((choice, index) => {
			if (choice.endsDialogue || choice.targetNode === undefined || seen.has(choice.targetNode)) return
			const targetId = choice.targetNode
			const target = nodes.get(targetId)
			if (!target || !follow(node, index, target)) return
			seen.add(targetId)
			queue.push(targetId)
		})
	}

	return seen
}

export function checkDialogues(context: CheckContext, trees: readonly DialogueTree[]) {
	const seenIds = new Set<DialogueId>()

	for (const tree of trees) {
		if (seenIds.has(tree.id)) {
			context.findings.error('DuplicateDialogueId', `Dialogue id ${tree.id} is used more than once`, { dialogueId: tree.id })
			continue
		}
		seenIds.add(tree.id)
		checkTree(context, tree)
	}
}

function checkTree(context: CheckContext, tree: DialogueTree) {
	const { findings } = context
	const nodes = nodeIndex(tree)
	const dialogueId = tree.id

	if (!nodes.has(tree.rootNode)) {
		findings.error('MissingRootNode', `Dialogue ${dialogueId} root node ${tree.rootNode} does not exist`, { dialogueId })
	}

	if (tree.associatedQuest !== undefined && !context.quests.has(tree.associatedQuest)) {
		findings.error(
			'UnknownAssociatedQuest',
			`Dialogue ${dialogueId} is associated with unknown quest ${tree.associatedQuest}`,
			{ dialogueId }
		)
	}

	for (const [key, node] of nodes) {
		const where = `Dialogue ${dialogueId} node ${key}`
		const location = { dialogueId, nodeId: key }

		if (node.id !== key) {
			findings.error('NodeIdMismatch', `${where} declares id ${node.id}`, location)
		}
		if (node.text.trim() === '') {
			findings.error('EmptyNodeText', `${where} has no text`, location)
		}
		if (!node.isTerminal && node.choices.length === 0) {
			findings.warning('DeadEndNode', `${where} is not terminal but has no choices`, location)
		}

		checkConditions(context, node.conditions, location, where)
		checkActions(context, node.actions, location, where)

		node.choices.forEach((choice, choiceIndex) => {
			const choiceWhere = `${where} choice ${choiceIndex}`
			const choiceLocation = { ...location, choiceIndex }

			if (choice.targetNode === undefined) {
				if (!choice.endsDialogue) {
					findings.error('ChoiceWithoutTarget', `${choiceWhere} has no target and does not end the dialogue`, choiceLocation)
				}
			} else if (!nodes.has(choice.targetNode)) {
				findings.error('DanglingTarget', `${choiceWhere} targets missing node ${choice.targetNode}`, choiceLocation)
			}

			checkConditions(context, choice.conditions, choiceLocation, choiceWhere)
			checkActions(context, choice.actions, choiceLocation, choiceWhere)
		})
	}

	checkReachability(context, tree, nodes)
}

/**
 * Structural reachability ignores conditions. A node that is structurally
 * reachable but only through gates that are shut gets a warning.
 */
function checkReachability(context: CheckContext, tree: DialogueTree, nodes: ReadonlyMap<NodeId, DialogueNode>) {
	const dialogueId = tree.id
	if (!nodes.has(tree.rootNode)) return

	const structural = reachable(tree, nodes, () => true)

	for (const [key, node] of nodes) {
		if (!structural.has(key) && !node.isTerminal) {
			context.findings.error(
				'UnreachableNode',
				`Dialogue ${dialogueId} node ${key} cannot be reached from root node ${tree.rootNode}`,
				{ dialogueId, nodeId: key }
			)
		}
	}

	const open = reachable(tree, nodes, (from, choiceIndex, target) => {
		const gate = from.choices[choiceIndex]?.conditions ?? []
		return !isGateClosed(context, [...gate, ...target.conditions])
	})

	for (const key of structural) {
		if (!open.has(key)) {
			context.findings.warning(
				'ConditionallyUnreachable',
				`Dialogue ${dialogueId} node ${key} is only reachable through conditions that are false at campaign start`,
				{ dialogueId, nodeId: key }
			)
		}
	}
}
