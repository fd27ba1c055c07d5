import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js'
import { drizzle, type SQLJsDatabase } from 'drizzle-orm/sql-js'
import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import * as schema from './schema'

export interface HostKeyDatabase {
  db: SQLJsDatabase<typeof schema>
  // Write the database to its file after a change; nothing to do in memory
  persist(): void
  close(): void
}

const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), 'migrations')

let engine: Promise<SqlJsStatic> | null = null

function loadEngine(): Promise<SqlJsStatic> {
  if (!engine) engine = initSqlJs()
  return engine
}

// Apply the bundled SQL migrations in file name order
function migrate(sqlite: Database): void {
  sqlite.run(`
    CREATE TABLE IF NOT EXISTS __drizzle_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL,
      created_at INTEGER NOT NULL
    )
  `)

  const [result] = sqlite.exec('SELECT hash FROM __drizzle_migrations')
  const applied = new Set((result?.values ?? []).map(row => String(row[0])))
  const files = readdirSync(migrationsDir).filter(f => f.endsWith('.sql')).sort()

  for (const file of files) {
    const hash = file.replace('.sql', '')
    if (applied.has(hash)) continue

    const sql = readFileSync(join(migrationsDir, file), 'utf8')
    sqlite.exec('BEGIN')
    try {
      sqlite.exec(sql)
      sqlite.run('INSERT INTO __drizzle_migrations (hash, created_at) VALUES (?, ?)', [hash, Date.now()])
      sqlite.exec('COMMIT')
    } catch (err) {
      sqlite.exec('ROLLBACK')
      throw err
    }
  }
}

// ':memory:' keeps keys for the lifetime of the process only
export async function openDatabase(path = ':memory:'): Promise<HostKeyDatabase> {
  const SQL = await loadEngine()
  const inMemory = path === ':memory:'

  const sqlite = !inMemory && existsSync(path) ? new SQL.Database(readFileSync(path)) : new SQL.Database()
  migrate(sqlite)

  const persist = (): void => {
    if (inMemory) return
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(path, Buffer.from(sqlite.export()))
  }
  persist()

  return {
    db: drizzle(sqlite, { schema }),
    persist,
    close: () => sqlite.close(),
  }
}
