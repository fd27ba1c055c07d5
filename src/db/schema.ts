import { sqliteTable, text } from 'drizzle-orm/sqlite-core'

// SSH host keys per device hostname, "<type> <base64 key>"
export const sshHostKeys = sqliteTable('ssh_host_keys', {
  id: text('id').primaryKey(),
  hostname: text('hostname').notNull().unique(),
  hostKey: text('host_key').notNull(),
  createdAt: text('created_at').notNull(),
})

export type SshHostKey = typeof sshHostKeys.$inferSelect
