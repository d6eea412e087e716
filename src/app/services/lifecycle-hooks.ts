import type { NavigationParameters } from './navigation-parameters';
import type {
  Destructible,
  InitializeAware,
  NavigationAware,
  PageLifecycleAware,
  RegionContent,
  WindowLifecycleAware
} from './region-navigation.interface';

function isInitializeAware(target: object): target is InitializeAware {
  return 'initialize' in target && typeof target.initialize === 'function';
}

function isNavigationAware(target: object): target is NavigationAware {
  return 'onNavigatedTo' in target && typeof target.onNavigatedTo === 'function'
    && 'onNavigatedFrom' in target && typeof target.onNavigatedFrom === 'function';
}

function isDestructible(target: object): target is Destructible {
  return 'destroy' in target && typeof target.destroy === 'function';
}

function isWindowLifecycleAware(target: object): target is WindowLifecycleAware {
  return 'onResume' in target && typeof target.onResume === 'function'
    && 'onSleep' in target && typeof target.onSleep === 'function';
}

function isPageLifecycleAware(target: object): target is PageLifecycleAware {
  return 'onAppearing' in target && typeof target.onAppearing === 'function'
    && 'onDisappearing' in target && typeof target.onDisappearing === 'function';
}

// The content gets each hook before its controller does
function targetsOf(content: RegionContent): object[] {
  const { controller } = content;
  return controller && controller !== content ? [content, controller] : [content];
}

export function initialize(content: RegionContent, parameters: NavigationParameters): void {
  for (const target of targetsOf(content)) {
    if (isInitializeAware(target)) target.initialize(parameters);
  }
}

export function navigated(content: RegionContent, parameters: NavigationParameters, to: boolean): void {
  for (const target of targetsOf(content)) {
    if (!isNavigationAware(target)) continue;

    if (to) {
      target.onNavigatedTo(parameters);
    } else {
      target.onNavigatedFrom(parameters);
    }
  }
}

export function destroy(content: RegionContent): void {
  for (const target of targetsOf(content)) {
    if (isDestructible(target)) target.destroy();
  }
}

export function windowLifecycle(content: RegionContent, resume: boolean): void {
  for (const target of targetsOf(content)) {
    if (!isWindowLifecycleAware(target)) continue;

    if (resume) {
      target.onResume();
    } else {
      target.onSleep();
    }
  }
}

export function pageLifecycle(content: RegionContent, appearing: boolean): void {
  for (const target of targetsOf(content)) {
    if (!isPageLifecycleAware(target)) continue;

    if (appearing) {
      target.onAppearing();
    } else {
      target.onDisappearing();
    }
  }
}
