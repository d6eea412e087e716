import type { ContentBehavior, RegionContent } from '../services/region-navigation.interface';

/**
 * Base class for content shown by a region. Subclasses add whichever
 * lifecycle hooks they need (onNavigatedTo, destroy, onAppearing, ...).
 */
export class ContentView implements RegionContent {
  controller: object | null = null;
  readonly behaviors: ContentBehavior[] = [];

  constructor(readonly viewName: string) {}
}
