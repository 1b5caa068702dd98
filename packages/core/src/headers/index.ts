/**
 * Headers Module - SPDX license header checks
 *
 * @module headers
 */

export { HeaderModule } from './header_module';
export {
  DEFAULT_HEADER_POLICY,
  DEFAULT_COMMENT_PREFIXES,
  resolveHeaderPolicy,
  renderHeaderLines,
  hasRequiredHeader,
  insertHeader,
  extensionOf,
} from './header_template';
export type {
  IHeaderModule,
  HeaderModuleDependencies,
  HeaderPolicy,
  HeaderSelection,
  HeaderCheckReport,
  HeaderFixReport,
  HeaderFileError,
} from './headers.types';
