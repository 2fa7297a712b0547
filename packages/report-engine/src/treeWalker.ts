import type { Group, ResourceId } from '@glreporter/gitlab-client';
import { AggregateList } from './aggregate';
import type { EngineContext } from './context';
import { listOptions, reportBranchFailure } from './context';
import { RootFetchError } from './errors';
import { collectPages, iteratePages } from './pagination';
import { WaitGroup } from './waitGroup';

interface WalkState {
  context: EngineContext;
  groups: AggregateList<Group>;
  pending: WaitGroup;
}

/** Flat listing of every group the credential can see. Errors are fatal. */
export async function listAllGroups(context: EngineContext): Promise<Group[]> {
  context.logger.debug('Fetching all accessible groups');
  const groups = await collectPages((page) => context.gateway.listGroups(listOptions(context, page)), {
    signal: context.signal
  });
  context.logger.debug('Completed fetching all groups', { count: groups.length });
  return groups;
}

/**
 * Returns the root group and every subgroup below it. Only the root lookup is
 * fatal; a subgroup listing that fails drops that branch's descendants. A
 * `null` root lists all accessible groups without recursion.
 */
export async function walkGroupTree(context: EngineContext, rootId: ResourceId | null): Promise<Group[]> {
  if (rootId === null) {
    return listAllGroups(context);
  }

  context.logger.debug('Starting recursive group fetch', { rootId });

  let root: Group;
  try {
    root = await context.gateway.getGroup(rootId, { signal: context.signal });
  } catch (err) {
    context.signal?.throwIfAborted();
    throw new RootFetchError('group', rootId, err);
  }

  const state: WalkState = {
    context,
    groups: new AggregateList<Group>(),
    pending: new WaitGroup()
  };
  state.groups.append([root]);

  await submitExpansion(state, root.id);
  await state.pending.wait();
  context.signal?.throwIfAborted();

  context.logger.debug('Completed group fetch', { rootId, count: state.groups.size });
  return state.groups.toArray();
}

async function submitExpansion(state: WalkState, groupId: number): Promise<void> {
  state.pending.add(1);
  try {
    await state.context.pool.submit(() => expandGroup(state, groupId));
  } catch (err) {
    state.pending.done();
    throw err;
  }
}

async function expandGroup(state: WalkState, groupId: number): Promise<void> {
  const { context } = state;
  try {
    if (context.signal?.aborted) {
      return;
    }
    const pages = iteratePages((page) => context.gateway.listSubgroups(groupId, listOptions(context, page)), {
      signal: context.signal
    });
    for await (const subgroups of pages) {
      state.groups.append(subgroups);
      context.logger.debug('Fetched subgroups', { groupId, count: subgroups.length });
      for (const subgroup of subgroups) {
        await submitExpansion(state, subgroup.id);
      }
    }
  } catch (err) {
    if (!context.signal?.aborted) {
      reportBranchFailure(context, { operation: 'listSubgroups', kind: 'group', id: groupId, error: err });
    }
  } finally {
    state.pending.done();
  }
}
