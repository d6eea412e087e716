export class ViewResolutionError extends Error {
  constructor(readonly viewName: string) {
    super(`No view registered under the name '${viewName}'`);
    this.name = 'ViewResolutionError';
  }
}

export class InvalidNavigationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidNavigationError';
  }
}

export class RegionNotFoundError extends Error {
  constructor(readonly regionName: string) {
    super(`Region '${regionName}' is not registered`);
    this.name = 'RegionNotFoundError';
  }
}

export class DuplicateRegionError extends Error {
  constructor(readonly regionName: string) {
    super(`Region '${regionName}' is already registered`);
    this.name = 'DuplicateRegionError';
  }
}
