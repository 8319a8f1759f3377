/**
 * SQLite Adapter
 *
 * Production implementation of the taskping adapter using better-sqlite3.
 * Implements the canonical Adapter interface with normalized CRUD operations.
 */
import Database from 'better-sqlite3'
import type {
  Adapter, Assignment, AssignmentStatus, Comment, NewComment, NewTask, Role, Task, User,
} from './adapter'
import { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError } from './adapter'
import type { LocalDateTime } from './time-date'

// Re-export errors for callers importing from the adapter module
export { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
}

export type SqliteAdapter = Adapter & SqliteExtras

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    surname TEXT NOT NULL,
    contact TEXT NOT NULL UNIQUE CHECK (length(trim(contact)) > 0),
    role TEXT NOT NULL CHECK (role IN ('approver', 'assignee')),
    handle TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_users_role ON users(role);
  CREATE INDEX IF NOT EXISTS idx_users_handle ON users(handle COLLATE NOCASE);

  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL CHECK (length(trim(title)) > 0),
    description TEXT NOT NULL DEFAULT '',
    deadline TEXT NOT NULL,
    interval_minutes INTEGER NOT NULL CHECK (interval_minutes > 0),
    created_by INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS task_assignments (
    task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'accepted', 'completed')),
    updated_at TEXT NOT NULL,
    PRIMARY KEY (task_id, user_id)
  );
  CREATE INDEX IF NOT EXISTS idx_assignments_user ON task_assignments(user_id);

  CREATE TABLE IF NOT EXISTS comments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
    author_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    text TEXT NOT NULL CHECK (length(trim(text)) > 0),
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_comments_task ON comments(task_id);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint|PRIMARY KEY constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new ForeignKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type UserRow = {
  id: number
  name: string
  surname: string
  contact: string
  role: Role
  handle: string | null
}

type TaskRow = {
  id: number
  title: string
  description: string
  deadline: string
  interval_minutes: number
  created_by: number
  created_at: string
  updated_at: string
}

type AssignmentRow = {
  task_id: number
  user_id: number
  status: AssignmentStatus
  updated_at: string
}

type CommentRow = {
  id: number
  task_id: number
  author_id: number
  text: string
  created_at: string
}

type SchemaVersionRow = {
  v: number | null
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    surname: row.surname,
    contact: row.contact,
    role: row.role,
    ...(row.handle != null ? { handle: row.handle } : {}),
  }
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    deadline: row.deadline as LocalDateTime,
    intervalMinutes: row.interval_minutes,
    createdBy: row.created_by,
    createdAt: row.created_at as LocalDateTime,
    updatedAt: row.updated_at as LocalDateTime,
  }
}

function toAssignment(row: AssignmentRow): Assignment {
  return {
    taskId: row.task_id,
    userId: row.user_id,
    status: row.status,
    updatedAt: row.updated_at as LocalDateTime,
  }
}

function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    taskId: row.task_id,
    authorId: row.author_id,
    text: row.text,
    createdAt: row.created_at as LocalDateTime,
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec('PRAGMA foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  let _inTx = false

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // User
    // ================================================================
    async createUser(user: User) {
      safe(() =>
        db.prepare(
          'INSERT INTO users (id, name, surname, contact, role, handle) VALUES (?, ?, ?, ?, ?, ?)',
        ).run(user.id, user.name, user.surname, user.contact, user.role, user.handle ?? null),
      )
    },

    async getUser(id: number) {
      const row = db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(id)
      return row ? toUser(row) : null
    },

    async getUserByContact(contact: string) {
      const row = db.prepare<[string], UserRow>('SELECT * FROM users WHERE contact = ?').get(contact)
      return row ? toUser(row) : null
    },

    async getUserByHandle(handle: string) {
      const row = db.prepare<[string], UserRow>(
        'SELECT * FROM users WHERE handle = ? COLLATE NOCASE ORDER BY id LIMIT 1',
      ).get(handle)
      return row ? toUser(row) : null
    },

    async getUsersByName(name: string, surname: string) {
      const rows = db.prepare<[string, string], UserRow>(
        'SELECT * FROM users WHERE name = ? COLLATE NOCASE AND surname = ? COLLATE NOCASE ORDER BY id',
      ).all(name, surname)
      return rows.map(toUser)
    },

    async getUsersByRole(role: Role) {
      const rows = db.prepare<[string], UserRow>('SELECT * FROM users WHERE role = ? ORDER BY id').all(role)
      return rows.map(toUser)
    },

    async getAllUsers() {
      const rows = db.prepare<[], UserRow>('SELECT * FROM users ORDER BY id').all()
      return rows.map(toUser)
    },

    async updateUser(id: number, changes: Partial<Omit<User, 'id'>>) {
      const existing = db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(id)
      if (!existing) throw new NotFoundError(`User '${id}' not found`)
      const merged = { ...toUser(existing), ...changes }
      safe(() =>
        db.prepare(
          'UPDATE users SET name = ?, surname = ?, contact = ?, role = ?, handle = ? WHERE id = ?',
        ).run(merged.name, merged.surname, merged.contact, merged.role, merged.handle ?? null, id),
      )
    },

    async deleteUser(id: number) {
      db.prepare('DELETE FROM users WHERE id = ?').run(id)
    },

    // ================================================================
    // Task
    // ================================================================
    async createTask(task: NewTask) {
      const info = safe(() =>
        db.prepare(
          'INSERT INTO tasks (title, description, deadline, interval_minutes, created_by, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?)',
        ).run(
          task.title,
          task.description,
          task.deadline,
          task.intervalMinutes,
          task.createdBy,
          task.createdAt,
          task.updatedAt,
        ),
      )
      return Number(info.lastInsertRowid)
    },

    async getTask(id: number) {
      const row = db.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id)
      return row ? toTask(row) : null
    },

    async getAllTasks() {
      const rows = db.prepare<[], TaskRow>('SELECT * FROM tasks ORDER BY id').all()
      return rows.map(toTask)
    },

    async updateTask(id: number, changes: Partial<Omit<Task, 'id'>>) {
      const existing = db.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id)
      if (!existing) throw new NotFoundError(`Task '${id}' not found`)
      const merged = { ...toTask(existing), ...changes }
      safe(() =>
        db.prepare(
          'UPDATE tasks SET title = ?, description = ?, deadline = ?, interval_minutes = ?, created_by = ?, created_at = ?, updated_at = ? WHERE id = ?',
        ).run(
          merged.title,
          merged.description,
          merged.deadline,
          merged.intervalMinutes,
          merged.createdBy,
          merged.createdAt,
          merged.updatedAt,
          id,
        ),
      )
    },

    async deleteTask(id: number) {
      // Assignments and comments go with it via ON DELETE CASCADE
      db.prepare('DELETE FROM tasks WHERE id = ?').run(id)
    },

    // ================================================================
    // Assignment
    // ================================================================
    async createAssignment(assignment: Assignment) {
      safe(() =>
        db.prepare(
          'INSERT INTO task_assignments (task_id, user_id, status, updated_at) VALUES (?, ?, ?, ?)',
        ).run(assignment.taskId, assignment.userId, assignment.status, assignment.updatedAt),
      )
    },

    async getAssignment(taskId: number, userId: number) {
      const row = db.prepare<[number, number], AssignmentRow>(
        'SELECT * FROM task_assignments WHERE task_id = ? AND user_id = ?',
      ).get(taskId, userId)
      return row ? toAssignment(row) : null
    },

    async getAssignmentsByTask(taskId: number) {
      const rows = db.prepare<[number], AssignmentRow>(
        'SELECT * FROM task_assignments WHERE task_id = ? ORDER BY user_id',
      ).all(taskId)
      return rows.map(toAssignment)
    },

    async getAssignmentsByUser(userId: number) {
      const rows = db.prepare<[number], AssignmentRow>(
        'SELECT * FROM task_assignments WHERE user_id = ? ORDER BY task_id',
      ).all(userId)
      return rows.map(toAssignment)
    },

    async updateAssignmentStatus(taskId: number, userId: number, status: AssignmentStatus, updatedAt: LocalDateTime) {
      const info = safe(() =>
        db.prepare(
          'UPDATE task_assignments SET status = ?, updated_at = ? WHERE task_id = ? AND user_id = ?',
        ).run(status, updatedAt, taskId, userId),
      )
      if (info.changes === 0) throw new NotFoundError(`Assignment '${taskId}:${userId}' not found`)
    },

    async deleteAssignmentsByTask(taskId: number) {
      db.prepare('DELETE FROM task_assignments WHERE task_id = ?').run(taskId)
    },

    // ================================================================
    // Comment
    // ================================================================
    async createComment(comment: NewComment) {
      const info = safe(() =>
        db.prepare(
          'INSERT INTO comments (task_id, author_id, text, created_at) VALUES (?, ?, ?, ?)',
        ).run(comment.taskId, comment.authorId, comment.text, comment.createdAt),
      )
      return Number(info.lastInsertRowid)
    },

    async getCommentsByTask(taskId: number) {
      const rows = db.prepare<[number], CommentRow>(
        'SELECT * FROM comments WHERE task_id = ? ORDER BY id',
      ).all(taskId)
      return rows.map(toComment)
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async listTables() {
      const rows = db.prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all()
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },

    async inTransaction() {
      return _inTx
    },
  }

  return adapter
}
