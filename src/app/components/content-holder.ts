import type { RegionContent, RegionHolder, RegionScope } from '../services/region-navigation.interface';

export class ContentHolder implements RegionHolder {
  content: RegionContent | undefined = undefined;

  constructor(public scope: RegionScope | undefined = undefined) {}
}
