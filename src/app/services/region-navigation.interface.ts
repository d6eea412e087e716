import type { EventEmitter } from '@angular/core';
import type { NavigationParameters } from './navigation-parameters';
import type { Region } from './region';

export enum NavigationDirection {
  New = 'New',
  Back = 'Back',
  Forward = 'Forward'
}

export interface ContentNavigationEvent {
  action: 'push' | 'pushBackwards' | 'replace' | 'back' | 'forward';
  viewName?: string;
  parameters?: NavigationParameters;
}

export interface ContentBehavior {
  attach(content: RegionContent): void;
  detach(content: RegionContent): void;
}

/**
 * Anything a region can display. Lifecycle hooks are picked up structurally,
 * either on the content itself or on its controller.
 */
export interface RegionContent {
  readonly viewName: string;
  controller: object | null;
  readonly behaviors: ContentBehavior[];
  contentNavigation?: EventEmitter<ContentNavigationEvent>;
}

export interface InitializeAware {
  initialize(parameters: NavigationParameters): void;
}

export interface NavigationAware {
  onNavigatedTo(parameters: NavigationParameters): void;
  onNavigatedFrom(parameters: NavigationParameters): void;
}

export interface Destructible {
  destroy(): void;
}

export interface WindowLifecycleAware {
  onResume(): void;
  onSleep(): void;
}

export interface PageLifecycleAware {
  onAppearing(): void;
  onDisappearing(): void;
}

export interface RegionScope {
  destroy(): void;
}

export interface RegionHolder {
  content: RegionContent | undefined;
  scope: RegionScope | undefined;
}

export interface RegionAccessor {
  regionName: string;
  holder: RegionHolder;
}

// Regions nested under a content item are discovered, never stored on it
export interface RegionLookup {
  getRegions(content: RegionContent): readonly Region[];
  removeHolder(regionName: string): void;
}

export interface RegionSnapshot {
  regionName: string;
  stack: readonly RegionContent[];
  current: RegionContent | undefined;
  direction: NavigationDirection;
}
