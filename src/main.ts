export { ContentHolder } from './app/components/content-holder';
export { ContentView } from './app/components/content-view';
export * as LifecycleHooks from './app/services/lifecycle-hooks';
export {
  DuplicateRegionError,
  InvalidNavigationError,
  RegionNotFoundError,
  ViewResolutionError
} from './app/services/navigation-errors';
export {
  KnownNavigationParameters,
  NavigationParameters,
  getNavigationDirection
} from './app/services/navigation-parameters';
export { NavigationResult } from './app/services/navigation-result';
export { Region } from './app/services/region';
export type { RegionOptions } from './app/services/region';
export { RegionManager } from './app/services/region-manager.service';
export type { CreateRegionOptions, RegionUpdate } from './app/services/region-manager.service';
export { NavigationDirection } from './app/services/region-navigation.interface';
export type {
  ContentBehavior,
  ContentNavigationEvent,
  Destructible,
  InitializeAware,
  NavigationAware,
  PageLifecycleAware,
  RegionAccessor,
  RegionContent,
  RegionHolder,
  RegionLookup,
  RegionScope,
  RegionSnapshot,
  WindowLifecycleAware
} from './app/services/region-navigation.interface';
export { InjectorViewProvider, REGION_BEHAVIORS } from './app/services/view-provider.service';
export type { ViewFactory, ViewProvider, ViewRegistration } from './app/services/view-provider.service';
