import { RetentionServer } from './server'

const server = new RetentionServer()
void server.start().catch((error: unknown) => server.stop(error instanceof Error ? error : new Error(String(error))))
