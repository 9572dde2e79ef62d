export { Directory, type User, type ConnectOutcome } from './directory/Directory'
export { MailboxStore } from './directory/MailboxStore'
export { MailboxFile, MailboxSnapshotSchema, type MailboxSnapshot, DEFAULT_MAILBOX_FILE } from './storage/MailboxFile'
export { DedupCache } from './server/DedupCache'
export { RequestHandler, type HandledRequest, MAX_USERNAME_LENGTH } from './server/RequestHandler'
export { ChatServer, type ChatServerOptions, type ServerStats } from './server/ChatServer'
export { createAdminApp, createAdminRoutes } from './routes/admin'
export { loadServerConfig, type ServerConfig } from './config'
