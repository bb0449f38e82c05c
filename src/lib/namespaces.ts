/**
 * Namespace access policy
 *
 * When restriction is enforced, only objects whose PID namespace is listed in
 * the allowed namespaces are visible. Entries are compared in their colon form
 * ("demo:"), so "demo" never matches "demonstration:1".
 */

import type { NamespaceConfig } from '../config';
import { getNamespace } from '../types/pid';

/**
 * Check if an object's namespace is accessible under the given policy
 */
export function namespaceAccessible(pid: string, config: NamespaceConfig): boolean {
  if (!config.restrictionEnforced) {
    return true;
  }
  return config.allowedNamespaces.includes(`${getNamespace(pid)}:`);
}
