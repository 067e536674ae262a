import { useState, useEffect, useCallback, useRef } from 'react';
import type { SyncOutcome, SyncQueueManager } from '@/modules/sync/SyncQueueManager';

/**
 * Exposes the unsynced-scan count and a manual "sync now" action.
 * A failed cycle leaves the count where it was.
 */
export const useSyncQueue = (manager: SyncQueueManager) => {
  const [pendingCount, setPendingCount] = useState(0);
  const [isSyncing, setIsSyncing] = useState(false);
  const [lastOutcome, setLastOutcome] = useState<SyncOutcome | null>(null);
  const mountedRef = useRef(true);

  const refresh = useCallback(async () => {
    const count = await manager.pendingCount();
    if (mountedRef.current) {
      setPendingCount(count);
    }
    return count;
  }, [manager]);

  useEffect(() => {
    mountedRef.current = true;
    refresh().catch(error => {
      console.error('useSyncQueue: could not read pending count', error);
    });
    return () => {
      mountedRef.current = false;
    };
  }, [refresh]);

  const syncNow = useCallback(async (): Promise<SyncOutcome> => {
    setIsSyncing(true);
    try {
      const outcome = await manager.runSyncCycle();
      if (mountedRef.current) {
        setLastOutcome(outcome);
      }
      await refresh();
      return outcome;
    } finally {
      if (mountedRef.current) {
        setIsSyncing(false);
      }
    }
  }, [manager, refresh]);

  return {
    pendingCount,
    isSyncing,
    lastOutcome,
    syncNow,
    refresh
  };
};
