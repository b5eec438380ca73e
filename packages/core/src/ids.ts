export type DialogueId = number
export type NodeId = number
export type QuestId = number
export type ItemId = number
export type MonsterId = number
export type NpcId = number
export type MapId = number
export type CharacterId = string
export type ActorId = string
export type SessionId = string
