/**
 * Basic usage examples for evm-feed-collector
 *
 * Run with FEED_API_KEY (and optionally FEED_ENDPOINT) set.
 */

import {
  createFeedCollector,
  FeedCollector,
  StreamType,
  ConnectionError,
  type Collector,
  type FeedEvent,
} from '../src/index';

// Example 1: Collector from environment configuration
async function watchPendingTransactions() {
  const collector = await createFeedCollector(StreamType.TRANSACTIONS, {
    filter: { methodIds: ['0xa9059cbb'] }, // ERC-20 transfer
  });

  const stream = await collector.getEventStream();
  let seen = 0;
  for await (const event of stream) {
    if (event.kind === 'Transaction') {
      console.log('Pending transfer:', event.transaction.hash);
    }
    if (++seen >= 10) break; // stops the subscription
  }

  collector.getConnection().close();
}

// Example 2: Drive any collector the way an engine would
async function runCollector(collector: Collector<FeedEvent>, limit: number) {
  const stream = await collector.getEventStream();
  for await (const event of stream) {
    switch (event.kind) {
      case 'Transaction':
        console.log('tx', event.transaction.hash);
        break;
      case 'ExecutionPayload':
        console.log('block', event.block.number, `${event.block.transactions.length} txs`);
        break;
    }
    if (--limit <= 0) return;
  }
}

// Example 3: Explicit key, endpoint override and repointing
async function watchBlocks(apiKey: string) {
  let collector: FeedCollector;
  try {
    collector = await FeedCollector.create(apiKey, StreamType.EXECUTION_PAYLOADS, {
      endpoint: 'localhost:8546',
      propagateStreamErrors: true,
    });
  } catch (error) {
    if (error instanceof ConnectionError) {
      console.error(`Feed unavailable at ${error.endpoint}:`, error.message);
      return;
    }
    throw error;
  }

  await runCollector(collector, 3);

  // Streams opened after this point use the new endpoint
  await collector.setEndpoint('wss://feed.example.com');
  await runCollector(collector, 3);

  collector.getConnection().close();
}

export { watchPendingTransactions, runCollector, watchBlocks };
