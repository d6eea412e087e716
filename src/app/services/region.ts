import { Observable, Subject, Subscription } from 'rxjs';
import { environment } from '../../environments/environment';
import * as LifecycleHooks from './lifecycle-hooks';
import { InvalidNavigationError } from './navigation-errors';
import { KnownNavigationParameters, NavigationParameters } from './navigation-parameters';
import { NavigationResult } from './navigation-result';
import {
  NavigationDirection,
  type ContentNavigationEvent,
  type RegionAccessor,
  type RegionContent,
  type RegionHolder,
  type RegionLookup,
  type RegionSnapshot
} from './region-navigation.interface';
import type { ViewProvider } from './view-provider.service';

export interface RegionOptions {
  // Falls back to environment.traceNavigation
  trace?: boolean;
}

/**
 * Navigation host for one region holder. Keeps the ordered stack of content
 * the holder has shown and drives lifecycle notifications down the tree of
 * regions nested under the displayed content.
 *
 * Public navigation methods never throw; every fault is returned as a failed
 * NavigationResult. The recursion methods propagate.
 */
export class Region {
  private readonly regionStack: RegionContent[] = [];
  private readonly changes$ = new Subject<RegionSnapshot>();
  private readonly traceEnabled: boolean;
  private contentSubscription: Subscription | null = null;
  private destroyed = false;

  readonly changes: Observable<RegionSnapshot> = this.changes$.asObservable();

  constructor(
    protected readonly viewProvider: ViewProvider,
    protected readonly regionLookup: RegionLookup,
    protected readonly accessor: RegionAccessor,
    options: RegionOptions = {}
  ) {
    this.traceEnabled = options.trace ?? environment.traceNavigation;
  }

  get regionName(): string {
    return this.accessor.regionName;
  }

  get current(): RegionContent | undefined {
    return this.holder.content;
  }

  get stack(): readonly RegionContent[] {
    return [...this.regionStack];
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  protected get holder(): RegionHolder {
    return this.accessor.holder;
  }

  replaceAll(viewName: string, parameters = new NavigationParameters()): NavigationResult {
    return this.navigate('replaceAll', () => {
      const view = this.initView(viewName, parameters);

      const viewsToRemove = [...this.regionStack].reverse();

      parameters.set(KnownNavigationParameters.NavigationDirection, NavigationDirection.New);

      this.leaveCurrent(parameters);

      this.regionStack.push(view);
      this.activate(view, parameters);

      this.evict(viewsToRemove);

      return NavigationDirection.New;
    });
  }

  push(viewName: string, parameters = new NavigationParameters()): NavigationResult {
    return this.navigate('push', () => {
      const view = this.initView(viewName, parameters);

      const current = this.current;
      const index = current ? this.indexOfCurrent(current) : this.regionStack.length - 1;

      parameters.set(KnownNavigationParameters.NavigationDirection, NavigationDirection.New);

      this.leaveCurrent(parameters);

      // Forward history of the old position is dropped
      const viewsToRemove = this.regionStack.slice(index + 1).reverse();

      this.regionStack.push(view);
      this.activate(view, parameters);

      this.evict(viewsToRemove);

      return NavigationDirection.New;
    });
  }

  pushBackwards(viewName: string, parameters = new NavigationParameters()): NavigationResult {
    return this.navigate('pushBackwards', () => {
      const view = this.initView(viewName, parameters);

      // Without a current view the content goes to the front and nothing is dropped
      const current = this.current;
      const index = current ? this.indexOfCurrent(current) : 0;

      parameters.set(KnownNavigationParameters.NavigationDirection, NavigationDirection.New);

      this.leaveCurrent(parameters);

      const viewsToRemove = this.regionStack.slice(0, index).reverse();

      this.regionStack.splice(index, 0, view);
      this.activate(view, parameters);

      this.evict(viewsToRemove);

      return NavigationDirection.New;
    });
  }

  canGoBack(): boolean {
    const current = this.current;
    return current !== undefined
      && this.regionStack.length > 1
      && this.regionStack.indexOf(current) >= 1;
  }

  canGoForward(): boolean {
    const current = this.current;
    if (current === undefined || this.regionStack.length <= 1) return false;

    const index = this.regionStack.indexOf(current);
    return index !== -1 && index <= this.regionStack.length - 2;
  }

  goBack(parameters = new NavigationParameters()): NavigationResult {
    return this.navigate('goBack', () => {
      if (!this.canGoBack()) {
        throw new InvalidNavigationError('Cannot go back');
      }

      this.step(-1, NavigationDirection.Back, parameters);
      return NavigationDirection.Back;
    });
  }

  goForward(parameters = new NavigationParameters()): NavigationResult {
    return this.navigate('goForward', () => {
      if (!this.canGoForward()) {
        throw new InvalidNavigationError('Cannot go forward');
      }

      this.step(1, NavigationDirection.Forward, parameters);
      return NavigationDirection.Forward;
    });
  }

  navigatedRecursively(parameters: NavigationParameters, to: boolean): void {
    const current = this.current;
    if (!current) return;

    if (to) {
      LifecycleHooks.navigated(current, parameters, true);
    }

    for (const region of this.regionLookup.getRegions(current)) {
      region.navigatedRecursively(parameters, to);
    }

    if (!to) {
      LifecycleHooks.navigated(current, parameters, false);
    }
  }

  destroyAll(): void {
    // The name may already belong to a newer region
    if (this.destroyed) return;
    this.destroyed = true;

    this.log('destroyAll', { stack: this.regionStack.map(view => view.viewName) });

    this.unwatchContent();
    this.evict([...this.regionStack].reverse());
    this.holder.content = undefined;

    const scope = this.holder.scope;
    this.holder.scope = undefined;
    scope?.destroy();

    this.regionLookup.removeHolder(this.regionName);
  }

  destroyRecursively(view: RegionContent): void {
    for (const region of this.regionLookup.getRegions(view)) {
      region.destroyAll();
    }

    LifecycleHooks.destroy(view);

    for (const behavior of view.behaviors.splice(0)) {
      behavior.detach(view);
    }
    view.controller = null;
  }

  onWindowLifecycleRecursively(resume: boolean): void {
    for (const view of this.regionStack) {
      LifecycleHooks.windowLifecycle(view, resume);
    }

    for (const region of this.childRegions()) {
      region.onWindowLifecycleRecursively(resume);
    }
  }

  onPageLifecycleRecursively(appearing: boolean): void {
    if (appearing) {
      for (const view of this.regionStack) {
        LifecycleHooks.pageLifecycle(view, true);
      }
    }

    for (const region of this.childRegions()) {
      region.onPageLifecycleRecursively(appearing);
    }

    if (!appearing) {
      for (const view of [...this.regionStack].reverse()) {
        LifecycleHooks.pageLifecycle(view, false);
      }
    }
  }

  protected initView(viewName: string, parameters: NavigationParameters): RegionContent {
    const view = this.viewProvider.resolve(viewName);
    if (this.regionStack.includes(view)) {
      throw new InvalidNavigationError(`View '${viewName}' resolved to content already in region '${this.regionName}'`);
    }

    LifecycleHooks.initialize(view, parameters);

    this.viewProvider.applyBehaviors(view);

    return view;
  }

  private navigate(operation: string, body: () => NavigationDirection): NavigationResult {
    let direction: NavigationDirection;

    try {
      if (this.destroyed) {
        throw new InvalidNavigationError(`Region '${this.regionName}' has been destroyed`);
      }

      direction = body();
    } catch (error) {
      console.error(`[Region:${this.regionName}] ${operation} failed:`, error);
      return NavigationResult.failed(error);
    }

    this.log(operation, { current: this.current?.viewName, stack: this.regionStack.map(view => view.viewName) });
    this.changes$.next({
      regionName: this.regionName,
      stack: this.stack,
      current: this.current,
      direction
    });

    return NavigationResult.succeeded();
  }

  private step(offset: number, direction: NavigationDirection, parameters: NavigationParameters): void {
    const current = this.current;
    if (!current) return;

    const target = this.regionStack[this.regionStack.indexOf(current) + offset];

    parameters.set(KnownNavigationParameters.NavigationDirection, direction);

    this.leaveCurrent(parameters);
    this.activate(target, parameters);
  }

  private indexOfCurrent(current: RegionContent): number {
    const index = this.regionStack.indexOf(current);
    if (index === -1) {
      throw new InvalidNavigationError(`Current view '${current.viewName}' is not part of region '${this.regionName}'`);
    }

    return index;
  }

  private leaveCurrent(parameters: NavigationParameters): void {
    this.unwatchContent();
    this.navigatedRecursively(parameters, false);
  }

  private activate(view: RegionContent, parameters: NavigationParameters): void {
    this.holder.content = view;
    this.navigatedRecursively(parameters, true);
    this.watchContent(view);
  }

  // Evicted views leave the stack one by one, most recently inserted first
  private evict(views: readonly RegionContent[]): void {
    for (const view of views) {
      const index = this.regionStack.indexOf(view);
      if (index !== -1) {
        this.regionStack.splice(index, 1);
      }

      this.destroyRecursively(view);
    }
  }

  private childRegions(): readonly Region[] {
    const current = this.current;
    return current ? this.regionLookup.getRegions(current) : [];
  }

  private watchContent(view: RegionContent): void {
    if (!view.contentNavigation) return;

    this.contentSubscription = view.contentNavigation.subscribe(event => {
      this.log('content navigation requested', event);
      this.dispatch(event);
    });
  }

  private unwatchContent(): void {
    this.contentSubscription?.unsubscribe();
    this.contentSubscription = null;
  }

  private dispatch(event: ContentNavigationEvent): NavigationResult {
    const { action, viewName } = event;
    const parameters = event.parameters ?? new NavigationParameters();

    switch (action) {
      case 'back':
        return this.goBack(parameters);
      case 'forward':
        return this.goForward(parameters);
      case 'push':
        return viewName ? this.push(viewName, parameters) : this.missingViewName(action);
      case 'pushBackwards':
        return viewName ? this.pushBackwards(viewName, parameters) : this.missingViewName(action);
      case 'replace':
        return viewName ? this.replaceAll(viewName, parameters) : this.missingViewName(action);
    }
  }

  private missingViewName(action: ContentNavigationEvent['action']): NavigationResult {
    const error = new InvalidNavigationError(`Content navigation '${action}' requires a view name`);
    console.error(`[Region:${this.regionName}] ${action} failed:`, error);
    return NavigationResult.failed(error);
  }

  private log(message: string, data?: unknown): void {
    if (!this.traceEnabled) return;

    if (data !== undefined) {
      console.log(`[Region:${this.regionName}] ${message}`, data);
    } else {
      console.log(`[Region:${this.regionName}] ${message}`);
    }
  }
}
