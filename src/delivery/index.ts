import type { DeliveryMode } from '../../shared/app-state'
import { AppleScriptTextInserter } from './apple-script-inserter'
import { ConsoleSink } from './console-sink'

/**
 * 文本投递端
 * 无法投递时抛 DeliveryError('sink-unavailable')
 */
export interface DeliverySink {
  readonly name: string
  deliver(text: string): Promise<void>
}

export function createDeliverySink(mode: DeliveryMode): DeliverySink {
  return mode === 'print' ? new ConsoleSink() : new AppleScriptTextInserter()
}

export { AppleScriptTextInserter, ConsoleSink }
