/**
 * Extension Registry
 *
 * Maps constructor names to typed argument parsers. Reverse translation
 * and JSON loading only ever build gates through a registry, so the set
 * of constructible gates is exactly what the caller registers.
 */

import type {
  ExtensionGate,
  ExtensionGateJSON,
  ExtensionResolver,
} from '@qcis-bridge/circuit-core';
import { DescriptorArgs, formatDescriptor, parseDescriptor } from './descriptor';
import { CPMG, XY, XYYX } from './dynamical-decoupling';
import { UnknownExtensionError } from './errors';

/**
 * Builds an extension gate from parsed arguments
 */
export type ExtensionFactory = (args: DescriptorArgs) => ExtensionGate;

export type ExtensionRegistry = Readonly<Record<string, ExtensionFactory>>;

/**
 * Registry of the built-in dynamical decoupling gates
 */
export const DEFAULT_EXTENSIONS: ExtensionRegistry = {
  CPMG: (args) => CPMG.fromArgs(args),
  XY: (args) => XY.fromArgs(args),
  XYYX: (args) => XYYX.fromArgs(args),
};

function lookup(registry: ExtensionRegistry, name: string): ExtensionFactory {
  const factory = Object.prototype.hasOwnProperty.call(registry, name) ? registry[name] : undefined;
  if (!factory) {
    throw new UnknownExtensionError(name);
  }
  return factory;
}

/**
 * Rebuild an extension gate from its descriptor string
 *
 * @throws MalformedDescriptorError if the descriptor does not parse
 * @throws UnknownExtensionError if the constructor is not registered
 */
export function buildExtension(
  descriptor: string,
  registry: ExtensionRegistry = DEFAULT_EXTENSIONS
): ExtensionGate {
  const { name, args } = parseDescriptor(descriptor);
  return lookup(registry, name)(args);
}

/**
 * JSON resolver backed by a registry, for use with `Circuit.fromJSON`.
 * Unregistered names resolve to undefined.
 */
export function extensionResolver(registry: ExtensionRegistry = DEFAULT_EXTENSIONS): ExtensionResolver {
  return (json: ExtensionGateJSON) => {
    if (!Object.prototype.hasOwnProperty.call(registry, json.name)) {
      return undefined;
    }
    const source = formatDescriptor(json.name, json.params);
    return lookup(registry, json.name)(DescriptorArgs.fromRecord(json.params, source));
  };
}

/**
 * Resolver over the built-in gates
 */
export const resolveExtensionJSON: ExtensionResolver = extensionResolver();
