export * from './services/drivers'
export * from './services/errors'
export { encodeLength, decodeLength, encodeWord, encodeSentence, decodeSentence, SentenceDecoder, MAX_WORD_LENGTH } from './services/api/codec'
export type { WordEncoding } from './services/api/codec'
export { Session } from './services/api/session'
export type { SessionState, SessionOptions, SessionIO } from './services/api/session'
export { connectSocket } from './services/api/socket'
export type { Connector, DeviceSocket, SocketTarget } from './services/api/socket'
export { CommandChannel, buildCommand, parseSentence } from './services/api/channel'
export type { RawRecord, Reply, RunOptions, CommandArguments } from './services/api/channel'
export { login, challengeResponse } from './services/api/login'
export type { LoginMethod, Credentials } from './services/api/login'
export { Key, Keys, key, and, or, not, notDisabled } from './services/api/query'
export type { QueryExpression, QueryValue } from './services/api/query'
export { defineSchema, normalize, normalizeRecord } from './services/normalize/normalizer'
export type { Schema, FieldReader, NormalizeResult, NormalizationIssue, Source } from './services/normalize/normalizer'
export * from './services/normalize/coerce'
export { RouterOSConfig, ConfigDiff } from './services/config-diff'
export type { Section, Expression, Argument } from './services/config-diff'
export { SshChannel, fetchHostKey } from './services/ssh'
export type { ShellProvider, ShellSession, ExecResult, SshOptions } from './services/ssh'
export { HostKeyStore } from './services/host-keys'
export type { HostKeyFetcher } from './services/host-keys'
export { openDatabase } from './db/client'
export type { HostKeyDatabase } from './db/client'
