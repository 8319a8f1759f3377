/**
 * Message Templates
 *
 * Outbound text for every notification the core sends. Placeholders are
 * written `{name}`; unknown placeholders are left as-is.
 */

export type MessageTemplates = {
  reminder: string
  taskCompleted: string
  commentAdded: string
  taskAssigned: string
  taskDeleted: string
}

export const DEFAULT_MESSAGES: MessageTemplates = {
  reminder: '⏰ Reminder: task *{title}* is due {deadline}. Please mark it complete when done.',
  taskCompleted: 'The task *{title}* has been completed by all assignees. You can delete it now.',
  commentAdded: '💬 New comment on task *{title}* by {author}:\n\n{text}',
  taskAssigned: '📌 You have been assigned *{title}* (due {deadline}).',
  taskDeleted: '🗑️ Task *{title}* has been deleted.',
}

export function renderMessage(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.hasOwn(values, key) ? String(values[key]) : match,
  )
}
