/**
 * Run the promise generators in batches of `concurrency`; each batch starts
 * only when the previous one has settled. Results keep the input order.
 * A batch with a failure rejects once all of its members have settled, and
 * no later batch is started.
 */
export async function series<T>(
  functionsThatGeneratePromises: Array<() => Promise<T>>,
  concurrency = 1,
): Promise<T[]> {
  const pending = functionsThatGeneratePromises.slice();
  const results: T[] = [];
  const batchSize = Math.max(1, concurrency);

  while (pending.length) {
    const batch = pending.splice(0, batchSize);
    const outcomes = await Promise.allSettled(batch.map((fn) => fn()));
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") throw outcome.reason;
      results.push(outcome.value);
    }
  }

  return results;
}
