export { CidService, CidOptions, CidIssued, ReconcileResult } from './cid.service';
export { CidController } from './cid.controller';
export { createCidRoutes } from './cid.routes';
export { normalizeInstallationId } from './installation-id';
