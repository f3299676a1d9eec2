import net from 'net'

/**
 * Bind an ephemeral port on `host`, release it and return its number.
 * Another process may claim the port before it is reused.
 */
export async function allocateTcpPort(host: string): Promise<number> {
  const server = net.createServer()

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(0, host, () => {
      server.off('error', reject)
      resolve()
    })
  })

  const address = server.address()

  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()))
  })

  if (address === null || typeof address === 'string') {
    throw new Error(`cannot determine the port allocated on ${host}`)
  }
  return address.port
}
