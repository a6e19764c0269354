export class OmnibusInstallNotFoundError extends Error {
  constructor(readonly expectedAppDir?: string) {
    super(
      expectedAppDir !== undefined
        ? `Not an omnibus install: ${expectedAppDir} does not exist`
        : 'Not an omnibus install',
    );
    this.name = 'OmnibusInstallNotFoundError';
  }
}
