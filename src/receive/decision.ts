import readline from 'node:readline/promises'
import type { FileMetadata, Peer } from '../protocol/types.js'
import { errorMessage, formatSize, shortId } from '../utils.js'
import type { ReceiveStorage } from './storage.js'

export interface DecisionRequest {
  sessionId: string
  sender: Peer
  files: FileMetadata[]
}

/**
 * Decides which offered files to take. Resolves to the accepted file ids,
 * or null to decline the whole transfer. The signal fires when the decision
 * is no longer wanted (timeout or sender gone).
 */
export interface DecisionProvider {
  decide(request: DecisionRequest, signal: AbortSignal): Promise<string[] | null>
}

/** Accepts everything except files already received under the same name and size. */
export class QuickSavePolicy implements DecisionProvider {
  private storage: ReceiveStorage

  constructor(storage: ReceiveStorage) {
    this.storage = storage
  }

  async decide(request: DecisionRequest): Promise<string[]> {
    const accepted: string[] = []
    for (const file of request.files) {
      if (await this.storage.isDuplicate(file)) {
        console.log(`Skipping ${file.fileName}: already received`)
      } else {
        accepted.push(file.id)
      }
    }
    return accepted
  }
}

export class ConsolePrompt implements DecisionProvider {
  private input: NodeJS.ReadableStream
  private output: NodeJS.WritableStream
  private queue: Promise<unknown> = Promise.resolve()

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.input = input
    this.output = output
  }

  decide(request: DecisionRequest, signal: AbortSignal): Promise<string[] | null> {
    // One question on the terminal at a time
    const next = this.queue.then(() => this.ask(request, signal))
    this.queue = next.catch(() => undefined)
    return next
  }

  private async ask(request: DecisionRequest, signal: AbortSignal): Promise<string[] | null> {
    if (signal.aborted) return null

    const { sender, files } = request
    const total = files.reduce((sum, f) => sum + f.size, 0)
    const lines = [
      `\n${sender.alias} (${shortId(sender.fingerprint)}) at ${sender.address} wants to send ${files.length} file(s), ${formatSize(total)}:`,
      ...files.map(f => f.preview !== undefined && f.fileType === 'text/plain'
        ? `  "${f.preview}"`
        : `  ${f.fileName} (${formatSize(f.size)})`)
    ]
    this.output.write(lines.join('\n') + '\n')

    const rl = readline.createInterface({ input: this.input, output: this.output })
    try {
      const answer = await rl.question('Accept? [y/N] ', { signal })
      return /^y(es)?$/i.test(answer.trim()) ? files.map(f => f.id) : null
    } catch (err) {
      if (!signal.aborted) console.error('Prompt failed:', errorMessage(err))
      return null
    } finally {
      rl.close()
    }
  }
}

/**
 * Runs a provider with a deadline. Timeout, an abort of `signal`, or a
 * provider error all count as declined.
 */
export async function decideWithTimeout(
  provider: DecisionProvider,
  request: DecisionRequest,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<string[] | null> {
  const controller = new AbortController()
  const onAbort = (): void => controller.abort()
  signal?.addEventListener('abort', onAbort, { once: true })
  if (signal?.aborted) controller.abort()

  const timer = setTimeout(() => {
    console.log(`Decision for session ${shortId(request.sessionId)} timed out`)
    controller.abort()
  }, timeoutMs)

  const aborted = new Promise<null>(resolve => {
    if (controller.signal.aborted) resolve(null)
    else controller.signal.addEventListener('abort', () => resolve(null), { once: true })
  })

  try {
    return await Promise.race([provider.decide(request, controller.signal), aborted])
  } catch (err) {
    console.error(`Decision failed: ${errorMessage(err)}`)
    return null
  } finally {
    clearTimeout(timer)
    signal?.removeEventListener('abort', onAbort)
    controller.abort()
  }
}
