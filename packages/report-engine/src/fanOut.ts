import type { EngineContext } from './context';
import { reportBranchFailure } from './context';
import type { NodeKind } from './errors';
import { AggregateList } from './aggregate';
import { WaitGroup } from './waitGroup';

export interface FanOutOptions<TNode> {
  operation: string;
  kind: NodeKind;
  idOf(node: TNode): number;
  run(node: TNode): Promise<void>;
}

/**
 * Submits one pool task per node and waits for all of them. A node whose task
 * fails is reported as a branch failure and contributes nothing.
 */
export async function fanOut<TNode>(
  context: EngineContext,
  nodes: readonly TNode[],
  options: FanOutOptions<TNode>
): Promise<void> {
  const pending = new WaitGroup();
  let submitFailure: { error: unknown } | null = null;

  for (const node of nodes) {
    if (context.signal?.aborted) {
      break;
    }
    pending.add(1);
    const task = async () => {
      try {
        if (context.signal?.aborted) {
          return;
        }
        await options.run(node);
      } catch (err) {
        if (!context.signal?.aborted) {
          reportBranchFailure(context, {
            operation: options.operation,
            kind: options.kind,
            id: options.idOf(node),
            error: err
          });
        }
      } finally {
        pending.done();
      }
    };
    try {
      await context.pool.submit(task);
    } catch (err) {
      pending.done();
      submitFailure = { error: err };
      break;
    }
  }

  await pending.wait();
  if (submitFailure) {
    throw submitFailure.error;
  }
  context.signal?.throwIfAborted();
}

/** Fans out `fetch` over `nodes` and concatenates what each node yields. */
export async function collectFromEach<TNode, TItem>(
  context: EngineContext,
  nodes: readonly TNode[],
  options: Omit<FanOutOptions<TNode>, 'run'> & { fetch(node: TNode): Promise<TItem[]> }
): Promise<TItem[]> {
  const results = new AggregateList<TItem>();
  await fanOut(context, nodes, {
    operation: options.operation,
    kind: options.kind,
    idOf: options.idOf,
    run: async (node) => {
      results.append(await options.fetch(node));
    }
  });
  return results.toArray();
}
