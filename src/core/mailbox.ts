import { toError } from '../utils/errors'
import { createModuleLogger } from '../utils/logger'

const logger = createModuleLogger('mailbox')

/**
 * 单消费者信箱
 *
 * 消息按投递顺序逐条处理，前一条的处理函数结束（含 await）后才开始下一条。
 * 处理函数抛出的错误只记录日志，不会中断后续消息。
 */
export class Mailbox<M> {
  private chain: Promise<void> = Promise.resolve()
  private pending = 0
  private closed = false

  constructor(private readonly handler: (message: M) => Promise<void> | void) {}

  /**
   * 投递消息，立即返回；信箱关闭后返回 false
   */
  post(message: M): boolean {
    if (this.closed) return false
    this.pending++
    const run = async () => {
      try {
        await this.handler(message)
      } catch (error) {
        logger.error(toError(error), { operation: 'mailbox' })
      } finally {
        this.pending--
      }
    }
    this.chain = this.chain.then(run, run)
    return true
  }

  /**
   * 处理完当前队列中的全部消息（含处理过程中新投递的消息）后 resolve
   */
  async drain(): Promise<void> {
    while (this.pending > 0) {
      await this.chain
    }
  }

  get size(): number {
    return this.pending
  }

  /**
   * 不再接受新消息，已排队的消息照常处理
   */
  close(): void {
    this.closed = true
  }

  get isClosed(): boolean {
    return this.closed
  }
}
