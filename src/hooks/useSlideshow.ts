import { useEffect, useState } from 'react';
import type { NavigationController, NavigationSnapshot } from '../utils/navigationController.js';

/**
 * Binds the view to a navigation controller: re-renders on every state
 * change and arms the auto-play timer once the subscription is in place.
 * The timer is cancelled when the view unmounts.
 */
export function useSlideshow(controller: NavigationController): NavigationSnapshot {
  const [snapshot, setSnapshot] = useState<NavigationSnapshot>(() => controller.getSnapshot());

  useEffect(() => {
    const unsubscribe = controller.subscribe(setSnapshot);
    // Catch up on anything that changed between render and subscribe
    setSnapshot(controller.getSnapshot());
    controller.start();

    return () => {
      unsubscribe();
      controller.dispose();
    };
  }, [controller]);

  return snapshot;
}
