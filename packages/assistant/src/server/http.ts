import { createServer, type Server } from 'node:http'
import type { ILogger } from '@markaz/pipeline'
import { type App, toNodeListener } from 'h3'

/** Binds the app to a Node HTTP server and resolves once it is listening. */
export function listen(app: App, address: { host: string; port: number }, logger: ILogger): Promise<Server> {
	const server = createServer(toNodeListener(app))
	return new Promise((resolve, reject) => {
		server.once('error', reject)
		server.listen(address.port, address.host, () => {
			server.off('error', reject)
			logger.info(`Listening on http://${address.host}:${address.port}`)
			resolve(server)
		})
	})
}

export function close(server: Server): Promise<void> {
	return new Promise((resolve, reject) => {
		server.close((error) => (error ? reject(error) : resolve()))
	})
}
