import { eq } from 'drizzle-orm'
import { nanoid } from 'nanoid'
import { sshHostKeys } from '../db/schema'
import type { HostKeyDatabase } from '../db/client'
import { fetchHostKey } from './ssh'

export type HostKeyFetcher = (hostname: string, port: number) => Promise<string>

// Persisted SSH host keys; unknown hosts are fetched once and pinned
export class HostKeyStore {
  constructor(
    private readonly database: HostKeyDatabase,
    private readonly fetchKey: HostKeyFetcher = fetchHostKey
  ) {}

  async get(hostname: string): Promise<string | null> {
    const [row] = await this.database.db.select()
      .from(sshHostKeys)
      .where(eq(sshHostKeys.hostname, hostname))
      .limit(1)
    return row?.hostKey ?? null
  }

  async save(hostname: string, hostKey: string): Promise<void> {
    await this.database.db.insert(sshHostKeys)
      .values({ id: nanoid(), hostname, hostKey, createdAt: new Date().toISOString() })
      .onConflictDoUpdate({ target: sshHostKeys.hostname, set: { hostKey } })
    this.database.persist()
  }

  async forHostname(hostname: string, port = 22): Promise<string> {
    const known = await this.get(hostname)
    if (known) return known

    const fetched = await this.fetchKey(hostname, port)
    await this.save(hostname, fetched)
    return fetched
  }

  async forget(hostname: string): Promise<void> {
    await this.database.db.delete(sshHostKeys).where(eq(sshHostKeys.hostname, hostname))
    this.database.persist()
  }
}
