export const QuestEvents = {
	Started: 'quest:started',
	ObjectiveProgress: 'quest:objective-progress',
	StageCompleted: 'quest:stage-completed',
	Completed: 'quest:completed'
} as const
