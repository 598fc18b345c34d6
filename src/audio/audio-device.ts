/**
 * 录音设备抽象
 *
 * 设备打开后得到一个独占的流句柄；数据为 16-bit little-endian PCM
 */

export interface AudioDeviceOptions {
  sampleRate: number
  channels: number
  /** 输入设备名称，留空使用系统默认设备 */
  device?: string
}

export interface AudioStreamHandle {
  /** 注册数据回调，注册前收到的数据块会被补发 */
  onData(listener: (chunk: Buffer) => void): void
  /** 流在运行中出错（设备拔出等） */
  onError(listener: (error: Error) => void): void
  /** 刷新并关闭流；对已出错或已关闭的句柄也必须可调用 */
  close(): Promise<void>
}

export interface AudioDevice {
  /**
   * 打开输入流
   * 没有可用输入设备时以 CaptureError('device-unavailable') 拒绝
   */
  open(options: AudioDeviceOptions): Promise<AudioStreamHandle>
}
