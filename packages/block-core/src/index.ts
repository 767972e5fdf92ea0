/**
 * @tfweave/block-core
 *
 * Authoring model for tfweave definition sources: value trees, fragments,
 * category policies, item builders and Terraform JSON document conversion.
 * Pure code with no I/O, shared by the renderer and by user modules.
 *
 * @example
 * ```typescript
 * // main.tf.ts
 * import { provider, resource, exportValue } from '@tfweave/block-core';
 *
 * export default function* blocks() {
 *   yield provider('aws', { region: 'eu-west-1' });
 *   yield resource('aws_s3_bucket', 'logs', { bucket: 'acme-logs' });
 *   yield exportValue('bucket', 'acme-logs');
 * }
 * ```
 */

// Re-export types
export type {
  BlockContext,
  BlockItem,
  BlockStream,
  Category,
  ConfigMap,
  ConfigValue,
  ExportDeclaration,
  ExportRequest,
  Fragment,
  Producer,
  Scalar,
  SourceKind,
  ValueRequest,
  VariableRequest,
  Yieldable,
} from './types.js';

export { BlockParseError } from './types.js';

export type { CategoryPolicy } from './categories.js';
export {
  CATEGORY_POLICIES,
  DEFAULT_PROVIDER_LABEL,
  DOCUMENT_CATEGORIES,
  formatLabelKey,
  identityOf,
  policyFor,
} from './categories.js';

export type { ProviderOptions } from './blocks.js';
export {
  createBlockContext,
  data,
  exportValue,
  local,
  lookup,
  module,
  need,
  output,
  provider,
  resource,
  terraform,
  tfvar,
  variable,
  variableRequest,
} from './blocks.js';

export { encodeDocument, fromDocument } from './document.js';

export {
  BlockItemSchema,
  CategorySchema,
  ConfigMapSchema,
  ConfigValueSchema,
  parseFragment,
  parseYielded,
} from './schema.js';
