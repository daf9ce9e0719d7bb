export { PackageCatalog, Package, DEFAULT_PACKAGES } from './package.catalog';
