import { InjectionToken, Injector, type StaticProvider } from '@angular/core';
import { ViewResolutionError } from './navigation-errors';
import type { ContentBehavior, RegionContent } from './region-navigation.interface';

export type ViewFactory<T> = (injector: Injector) => T;

export interface ViewRegistration {
  viewName: string;
  view: ViewFactory<RegionContent>;
  controller?: ViewFactory<object>;
  behaviors?: ReadonlyArray<ViewFactory<ContentBehavior>>;
}

/**
 * Produces content for a logical view name, controller already wired.
 * Throws ViewResolutionError for names it does not know.
 */
export interface ViewProvider {
  resolve(viewName: string): RegionContent;
  applyBehaviors(content: RegionContent): void;
}

// Multi provider: behaviors attached to every view the provider resolves
export const REGION_BEHAVIORS = new InjectionToken<ViewFactory<ContentBehavior>[]>('REGION_BEHAVIORS');

export class InjectorViewProvider implements ViewProvider {
  private readonly tokens = new Map<string, InjectionToken<ViewRegistration>>();
  private readonly injector: Injector;

  constructor(registrations: readonly ViewRegistration[], parent?: Injector) {
    const providers: StaticProvider[] = [];

    for (const registration of registrations) {
      const token = new InjectionToken<ViewRegistration>(`view:${registration.viewName}`);
      this.tokens.set(registration.viewName, token);
      providers.push({ provide: token, useValue: registration });
    }

    this.injector = Injector.create({ providers, parent, name: 'InjectorViewProvider' });
  }

  get viewNames(): string[] {
    return [...this.tokens.keys()];
  }

  hasView(viewName: string): boolean {
    return this.tokens.has(viewName);
  }

  resolve(viewName: string): RegionContent {
    const registration = this.getRegistration(viewName);

    const view = registration.view(this.injector);
    if (registration.controller) {
      view.controller = registration.controller(this.injector);
    }

    return view;
  }

  applyBehaviors(content: RegionContent): void {
    const own = this.hasView(content.viewName) ? this.getRegistration(content.viewName).behaviors ?? [] : [];
    const shared = this.injector.get(REGION_BEHAVIORS, []);

    for (const factory of [...own, ...shared]) {
      const behavior = factory(this.injector);
      behavior.attach(content);
      content.behaviors.push(behavior);
    }
  }

  private getRegistration(viewName: string): ViewRegistration {
    const token = this.tokens.get(viewName);
    if (!token) {
      throw new ViewResolutionError(viewName);
    }

    return this.injector.get(token);
  }
}
