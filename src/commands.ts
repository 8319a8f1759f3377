/**
 * Commands
 *
 * Structured inbound commands. A transport turns whatever it receives into a
 * plain object, `decodeCommand` validates it, and `dispatchCommand` routes it
 * to the engine according to the actor's role.
 */

import { z } from 'zod'
import type { TransitionOutcome } from './assignment-state'
import type { Comment, Task, TaskForUser, User } from './domain-types'
import { ForbiddenError, NotFoundError, ValidationError } from './errors'
import type { Taskping, TickReport } from './public-api'
import { EDIT_FIELDS, type EditField, type TaskEdit } from './tasks'

// ============================================================================
// Schemas
// ============================================================================

const id = z.coerce.number().int().positive()

const assigneesSchema = z.union([z.literal('all'), z.array(id)])

const commandSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('register'),
    userId: id,
    contact: z.string(),
    name: z.string(),
    surname: z.string(),
    role: z.enum(['approver', 'assignee']),
    handle: z.string().optional(),
  }),
  z.object({
    type: z.literal('createTask'),
    actorId: id,
    title: z.string(),
    description: z.string().default(''),
    deadline: z.string(),
    intervalMinutes: id.optional(),
    assignees: assigneesSchema,
  }),
  z.object({
    type: z.literal('editTask'),
    actorId: id,
    taskId: id,
    field: z.enum(EDIT_FIELDS),
    value: z.unknown(),
  }),
  z.object({ type: z.literal('deleteTask'), actorId: id, taskId: id }),
  z.object({ type: z.literal('remindNow'), actorId: id, taskId: id }),
  z.object({ type: z.literal('accept'), actorId: id, taskId: id }),
  z.object({ type: z.literal('complete'), actorId: id, taskId: id }),
  z.object({ type: z.literal('comment'), actorId: id, taskId: id, text: z.string() }),
  z.object({ type: z.literal('listTasks'), actorId: id }),
])

type RawCommand = z.infer<typeof commandSchema>

// ============================================================================
// Types
// ============================================================================

export type EditTaskCommand = { type: 'editTask'; actorId: number; taskId: number; edit: TaskEdit }

export type Command = Exclude<RawCommand, { type: 'editTask' }> | EditTaskCommand

export type CommandType = Command['type']

export type CommandResult =
  | { type: 'registered'; user: User }
  | { type: 'taskCreated'; task: Task }
  | { type: 'taskEdited'; task: Task }
  | { type: 'taskDeleted'; taskId: number }
  | { type: 'reminded'; report: TickReport }
  | { type: 'transition'; outcome: TransitionOutcome }
  | { type: 'commented'; comment: Comment }
  | { type: 'tasks'; tasks: TaskForUser[] }

// ============================================================================
// Decoding
// ============================================================================

function describe(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return 'Invalid command'
  const path = issue.path.join('.')
  return path === '' ? `Invalid command: ${issue.message}` : `Invalid command field '${path}': ${issue.message}`
}

function parseValue<T>(schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ValidationError(`Invalid command field 'value': ${issue?.message ?? 'invalid value'}`)
  }
  return parsed.data
}

function decodeEdit(field: EditField, value: unknown): TaskEdit {
  switch (field) {
    case 'title':
      return { field: 'title', value: parseValue(z.string(), value) }
    case 'description':
      return { field: 'description', value: parseValue(z.string(), value) }
    case 'deadline':
      return { field: 'deadline', value: parseValue(z.string(), value) }
    case 'interval':
      return { field: 'interval', value: parseValue(id, value) }
    case 'assignees':
      return { field: 'assignees', value: parseValue(assigneesSchema, value) }
  }
}

/** Validate untrusted input into a Command. Throws ValidationError. */
export function decodeCommand(input: unknown): Command {
  const parsed = commandSchema.safeParse(input)
  if (!parsed.success) throw new ValidationError(describe(parsed.error))
  const raw = parsed.data
  if (raw.type !== 'editTask') return raw
  return { type: 'editTask', actorId: raw.actorId, taskId: raw.taskId, edit: decodeEdit(raw.field, raw.value) }
}

// ============================================================================
// Dispatch
// ============================================================================

type ActorCommand = Exclude<Command, { type: 'register' }>

function forbidden(actor: User, command: ActorCommand): never {
  throw new ForbiddenError(`An ${actor.role} cannot run '${command.type}'`)
}

async function dispatchApprover(engine: Taskping, actor: User, command: ActorCommand): Promise<CommandResult> {
  switch (command.type) {
    case 'createTask':
      return {
        type: 'taskCreated',
        task: await engine.createTask({
          actorId: actor.id,
          title: command.title,
          description: command.description,
          deadline: command.deadline,
          intervalMinutes: command.intervalMinutes,
          assignees: command.assignees,
        }),
      }
    case 'editTask':
      return { type: 'taskEdited', task: await engine.editTask(actor.id, command.taskId, command.edit) }
    case 'deleteTask':
      await engine.deleteTask(actor.id, command.taskId)
      return { type: 'taskDeleted', taskId: command.taskId }
    case 'remindNow':
      return { type: 'reminded', report: await engine.remindNow(actor.id, command.taskId) }
    case 'comment':
      return { type: 'commented', comment: await engine.addComment(actor.id, command.taskId, command.text) }
    case 'listTasks': {
      const tasks = await engine.listTasks()
      return { type: 'tasks', tasks: tasks.map((task) => ({ task, status: null })) }
    }
    case 'accept':
    case 'complete':
      return forbidden(actor, command)
  }
}

async function dispatchAssignee(engine: Taskping, actor: User, command: ActorCommand): Promise<CommandResult> {
  switch (command.type) {
    case 'accept':
      return { type: 'transition', outcome: await engine.acceptTask(actor.id, command.taskId) }
    case 'complete':
      return { type: 'transition', outcome: await engine.completeTask(actor.id, command.taskId) }
    case 'comment':
      return { type: 'commented', comment: await engine.addComment(actor.id, command.taskId, command.text) }
    case 'listTasks':
      return { type: 'tasks', tasks: await engine.listTasksForUser(actor.id) }
    case 'createTask':
    case 'editTask':
    case 'deleteTask':
    case 'remindNow':
      return forbidden(actor, command)
  }
}

/**
 * Run a decoded command. Registration is open to anyone; everything else is
 * routed by the actor's role, and a role without the operation gets a
 * ForbiddenError.
 */
export async function dispatchCommand(engine: Taskping, command: Command): Promise<CommandResult> {
  if (command.type === 'register') {
    const user = await engine.registerUser({
      id: command.userId,
      contact: command.contact,
      name: command.name,
      surname: command.surname,
      role: command.role,
      handle: command.handle,
    })
    return { type: 'registered', user }
  }

  const actor = await engine.getUser(command.actorId)
  if (!actor) throw new NotFoundError(`User ${command.actorId} is not registered`)
  switch (actor.role) {
    case 'approver':
      return dispatchApprover(engine, actor, command)
    case 'assignee':
      return dispatchAssignee(engine, actor, command)
  }
}
