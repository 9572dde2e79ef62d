export { ChatClient, type ChatClientOptions, type ClientResult, type ConnectResult } from './client/ChatClient'
export { SessionStore, SessionRecordSchema, DEFAULT_SESSION_FILE, type SessionRecord } from './session/SessionStore'
export { parseClientConfig, type ClientConfig } from './config'
export { establishSession, handleChoice, runMenu, type MenuIO, type MenuOutcome } from './cli/menu'
export { MENU, formatTimestamp, renderFailure, renderMessages, renderUsers } from './cli/render'
