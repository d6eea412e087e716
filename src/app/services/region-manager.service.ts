import { BehaviorSubject, Observable, Subscription } from 'rxjs';
import { filter, map } from 'rxjs/operators';
import { environment } from '../../environments/environment';
import { ContentHolder } from '../components/content-holder';
import { DuplicateRegionError, RegionNotFoundError } from './navigation-errors';
import { NavigationParameters } from './navigation-parameters';
import { NavigationResult } from './navigation-result';
import { Region, type RegionOptions } from './region';
import type {
  RegionAccessor,
  RegionContent,
  RegionLookup,
  RegionScope,
  RegionSnapshot
} from './region-navigation.interface';
import type { ViewProvider } from './view-provider.service';

export interface CreateRegionOptions {
  // Content item hosting the region; root regions have none
  owner?: RegionContent;
  scope?: RegionScope;
}

export interface RegionUpdate {
  regionName: string;
  snapshot: RegionSnapshot | null;
}

interface RegionEntry {
  region: Region;
  owner: RegionContent | undefined;
  subscription: Subscription;
}

export class RegionManager implements RegionLookup {
  private readonly entries = new Map<string, RegionEntry>();
  private readonly regionUpdates$ = new BehaviorSubject<RegionUpdate>({
    regionName: '',
    snapshot: null
  });

  constructor(
    protected readonly viewProvider: ViewProvider,
    protected readonly regionOptions: RegionOptions = {}
  ) {}

  get regionNames(): string[] {
    return [...this.entries.keys()];
  }

  get rootRegions(): Region[] {
    return this.regionsOwnedBy(undefined);
  }

  createRegion(regionName: string, options: CreateRegionOptions = {}): Region {
    if (this.entries.has(regionName)) {
      throw new DuplicateRegionError(regionName);
    }

    const holder = new ContentHolder(options.scope);
    const region = this.createRegionInstance({ regionName, holder });

    const subscription = region.changes.subscribe(snapshot => {
      this.regionUpdates$.next({ regionName, snapshot });
    });

    this.entries.set(regionName, { region, owner: options.owner, subscription });
    this.log(`registered region '${regionName}'`, { owner: options.owner?.viewName });

    return region;
  }

  getRegion(regionName: string): Region | undefined {
    return this.entries.get(regionName)?.region;
  }

  // Registration order, so broadcasts reach sibling regions deterministically
  getRegions(content: RegionContent): readonly Region[] {
    return this.regionsOwnedBy(content);
  }

  removeHolder(regionName: string): void {
    const entry = this.entries.get(regionName);
    if (!entry) return;

    entry.subscription.unsubscribe();
    this.entries.delete(regionName);
    this.log(`removed region '${regionName}'`);
    this.regionUpdates$.next({ regionName, snapshot: null });
  }

  navigateTo(regionName: string, viewName: string, parameters?: NavigationParameters): NavigationResult {
    const region = this.getRegion(regionName);
    if (!region) {
      const error = new RegionNotFoundError(regionName);
      console.error('[RegionManager] navigateTo failed:', error);
      return NavigationResult.failed(error);
    }

    return region.replaceAll(viewName, parameters ?? new NavigationParameters());
  }

  onWindowLifecycle(resume: boolean): void {
    for (const region of this.rootRegions) {
      region.onWindowLifecycleRecursively(resume);
    }
  }

  onPageLifecycle(appearing: boolean): void {
    for (const region of this.rootRegions) {
      region.onPageLifecycleRecursively(appearing);
    }
  }

  getRegionUpdates(regionName: string): Observable<RegionSnapshot | null> {
    return this.regionUpdates$.pipe(
      filter(update => update.regionName === regionName),
      map(update => update.snapshot)
    );
  }

  protected createRegionInstance(accessor: RegionAccessor): Region {
    return new Region(this.viewProvider, this, accessor, this.regionOptions);
  }

  private regionsOwnedBy(owner: RegionContent | undefined): Region[] {
    const regions: Region[] = [];
    for (const entry of this.entries.values()) {
      if (entry.owner === owner) regions.push(entry.region);
    }
    return regions;
  }

  private log(message: string, data?: unknown): void {
    if (!(this.regionOptions.trace ?? environment.traceNavigation)) return;

    if (data !== undefined) {
      console.log(`[RegionManager] ${message}`, data);
    } else {
      console.log(`[RegionManager] ${message}`);
    }
  }
}
