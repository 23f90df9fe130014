declare module 'hypercore-crypto' {
  export function randomBytes(n: number): Buffer
  export function hash(data: Buffer | Buffer[], out?: Buffer): Buffer
}
