/**
 * @stowplan/engine - Parser Module
 *
 * Item catalog CSV parsing and validation.
 */

export {
  parseItemCatalog,
  parseCatalogRows,
  parseCSVLine,
  normalizeHeader
} from './catalogParser';
