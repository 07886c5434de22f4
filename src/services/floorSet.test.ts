import { describe, expect, it } from 'vitest';
import {
  BUILDING,
  buildingDataset,
  FLOOR_FIRST,
  FLOOR_GROUND,
  FLOOR_ROOF,
  FLOOR_SECOND,
} from '../testing/fixtures';
import { compareIds } from '../utils/compare';
import { findFloorChain, resolveFloorSet } from './floorSet';
import { InMemoryRoutingStore } from './store/memoryStore';

describe('findFloorChain', () => {
  it('finds the fewest-hop chain', () => {
    const connections = [
      { fromFloorId: 'f1', toFloorId: 'f2' },
      { fromFloorId: 'f2', toFloorId: 'f3' },
      { fromFloorId: 'f1', toFloorId: 'f3' },
    ];
    expect(findFloorChain(connections, 'f1', 'f3')).toEqual(['f1', 'f3']);
  });

  it('resolves equal-length chains by floor id', () => {
    const connections = [
      { fromFloorId: 'a', toFloorId: 'y' },
      { fromFloorId: 'a', toFloorId: 'x' },
      { fromFloorId: 'y', toFloorId: 'z' },
      { fromFloorId: 'x', toFloorId: 'z' },
    ];
    expect(findFloorChain(connections, 'a', 'z')).toEqual(['a', 'x', 'z']);
  });

  it('returns null when no chain exists', () => {
    expect(findFloorChain([{ fromFloorId: 'a', toFloorId: 'b' }], 'a', 'c')).toBeNull();
  });
});

describe('resolveFloorSet', () => {
  const store = new InMemoryRoutingStore(buildingDataset());
  const request = {
    originFloorId: FLOOR_GROUND,
    destinationFloorId: FLOOR_SECOND,
    buildingId: BUILDING,
  };

  it('loads only the endpoint floors by default', async () => {
    expect(await resolveFloorSet(store, request, 'endpoints')).toEqual([FLOOR_GROUND, FLOOR_SECOND]);
  });

  it('adds intermediate floors with the connected strategy', async () => {
    expect(await resolveFloorSet(store, request, 'connected')).toEqual(
      [FLOOR_GROUND, FLOOR_FIRST, FLOOR_SECOND].sort(compareIds),
    );
  });

  it('falls back to the endpoints when the floors are not connected', async () => {
    const roof = { ...request, destinationFloorId: FLOOR_ROOF };
    expect(await resolveFloorSet(store, roof, 'connected')).toEqual([FLOOR_GROUND, FLOOR_ROOF]);
  });

  it('collapses a same-floor query to one floor', async () => {
    const same = { ...request, destinationFloorId: FLOOR_GROUND };
    expect(await resolveFloorSet(store, same, 'connected')).toEqual([FLOOR_GROUND]);
  });
});
