import dgram from 'node:dgram'

export interface DatagramSource {
  address: string
  port: number
}

export type DatagramHandler = (data: Buffer, from: DatagramSource) => void

/** Datagram I/O used by discovery; tests swap in an in-memory hub. */
export interface DatagramTransport {
  start(onMessage: DatagramHandler): Promise<void>
  send(data: Buffer, address: string, port: number): Promise<void>
  close(): Promise<void>
}

export interface UdpTransportOptions {
  port: number
  multicastAddress: string
  interfaceAddress?: string
}

export class UdpTransport implements DatagramTransport {
  private options: UdpTransportOptions
  private socket: dgram.Socket | null = null

  constructor(options: UdpTransportOptions) {
    this.options = options
  }

  start(onMessage: DatagramHandler): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true })
      this.socket = socket

      const onBindError = (err: Error): void => {
        this.socket = null
        socket.close()
        reject(err)
      }
      socket.once('error', onBindError)

      socket.on('message', (data, rinfo) => {
        onMessage(data, { address: rinfo.address, port: rinfo.port })
      })

      socket.bind(this.options.port, () => {
        socket.off('error', onBindError)
        socket.on('error', (err) => {
          console.error('Discovery socket error:', err.message)
        })
        try {
          socket.addMembership(this.options.multicastAddress, this.options.interfaceAddress)
          socket.setMulticastLoopback(true)
        } catch (err) {
          onBindError(err instanceof Error ? err : new Error(String(err)))
          return
        }
        resolve()
      })
    })
  }

  send(data: Buffer, address: string, port: number): Promise<void> {
    const socket = this.socket
    if (!socket) return Promise.reject(new Error('Discovery socket is not open'))
    return new Promise((resolve, reject) => {
      socket.send(data, port, address, (err) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }

  close(): Promise<void> {
    const socket = this.socket
    this.socket = null
    if (!socket) return Promise.resolve()
    return new Promise((resolve) => {
      socket.close(() => resolve())
    })
  }
}
