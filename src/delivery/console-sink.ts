import type { Writable } from 'node:stream'
import type { DeliverySink } from './index'
import { DeliveryError, toError } from '../utils/errors'

/**
 * 输出到标准输出，每次投递一行；日志走 stderr，不会混在一起
 */
export class ConsoleSink implements DeliverySink {
  readonly name = 'console'

  constructor(private readonly stream: Writable = process.stdout) {}

  deliver(text: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.stream.write(`${text}\n`, (error?: Error | null) => {
        if (error) {
          reject(new DeliveryError('sink-unavailable', `写入标准输出失败: ${toError(error).message}`, { cause: error }))
        } else {
          resolve()
        }
      })
    })
  }
}
