export * from './types.js';
export { COMPONENTS, ALL_SEQUENCE } from './components.js';
export {
  resolveLayout,
  resolveComponent,
  listItems,
  listCatalog,
  findCatalogItem,
  findStackFiles,
  type DistributionLayout,
  type StackFiles,
} from './catalog.js';
