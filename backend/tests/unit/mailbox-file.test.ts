import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import * as path from 'path'
import { MailboxFile } from '../../src/storage/MailboxFile'

const MAILBOXES = {
  bob: [
    { from: 'alice', body: 'hello', sentAt: 1700000000000 },
    { from: 'carol', body: '', sentAt: 1700000000001 }
  ]
}

describe('MailboxFile', () => {
  let dir: string
  let file: string
  let mailboxFile: MailboxFile

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'dgram-chat-mailboxes-'))
    file = path.join(dir, 'state', 'mailboxes.json')
    mailboxFile = new MailboxFile(file)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  it('should return null when nothing was saved', async () => {
    expect(await mailboxFile.load()).toBeNull()
  })

  it('should save and load mailboxes, creating directories', async () => {
    await mailboxFile.save(MAILBOXES, 42)

    expect(await mailboxFile.load()).toEqual(MAILBOXES)
    expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual({ savedAt: 42, mailboxes: MAILBOXES })
  })

  it('should leave no temp file behind', async () => {
    await mailboxFile.save(MAILBOXES)
    await mailboxFile.save({})

    expect(readdirSync(path.dirname(file))).toEqual(['mailboxes.json'])
    expect(await mailboxFile.load()).toEqual({})
  })

  it('should treat a corrupt file as empty', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    await mailboxFile.save({})
    writeFileSync(file, '{"savedAt": 1, "mailboxes":')

    expect(await mailboxFile.load()).toBeNull()
    expect(warn).toHaveBeenCalledTimes(1)
    expect(existsSync(file)).toBe(true)
  })

  it('should reject entries with the wrong shape', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    await mailboxFile.save({})
    writeFileSync(file, JSON.stringify({ savedAt: 1, mailboxes: { bob: [{ from: 'alice', body: 'hi', sentAt: -1 }] } }))

    expect(await mailboxFile.load()).toBeNull()
    expect(warn).toHaveBeenCalledTimes(1)
  })
})
