import type { Logger } from "@libp2p/logger"

import { LinkDBError, StorageRoundTripError } from "@linkdb/fields"

/** Run a store operation, wrapping anything the store throws in a StorageRoundTripError */
export function withStore<T>(log: Logger, operation: string, fn: () => T): T {
	try {
		return fn()
	} catch (err) {
		if (err instanceof LinkDBError) {
			throw err
		}

		log.error("%s failed: %O", operation, err)
		const message = err instanceof Error ? err.message : String(err)
		throw new StorageRoundTripError(`${operation} failed: ${message}`, { cause: err })
	}
}
