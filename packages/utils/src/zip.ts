export function* zip<A, B>(a: Iterable<A>, b: Iterable<B>): Generator<[A, B, number]> {
	const iterA = a[Symbol.iterator]()
	const iterB = b[Symbol.iterator]()
	for (let i = 0; ; i++) {
		const nextA = iterA.next()
		const nextB = iterB.next()
		if (nextA.done || nextB.done) {
			return
		}

		yield [nextA.value, nextB.value, i]
	}
}
