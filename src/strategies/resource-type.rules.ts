/**
 * Resource Type Rules
 *
 * Classifies an Azure resource path into the resource_type label by
 * substring match. Priority is the list order; a target matching none of the
 * rules is classified as 'unknown'.
 */

import type { ResourceType, ResourceTypeRule } from './metric-rule.interface';

function containsRule(
  fragment: string,
  resourceType: ResourceTypeRule['resourceType']
): ResourceTypeRule {
  return {
    resourceType,
    matches: (target) => target.includes(fragment),
  };
}

export const RESOURCE_TYPE_RULES: readonly ResourceTypeRule[] = [
  containsRule('Microsoft.Sql/managedInstances', 'sql_managed_instance'),
  containsRule('Microsoft.Compute/virtualMachines', 'virtual_machine'),
  containsRule('Microsoft.Storage/storageAccounts', 'storage_account'),
];

export function classifyResourceType(
  target: string,
  rules: readonly ResourceTypeRule[] = RESOURCE_TYPE_RULES
): ResourceType {
  const rule = rules.find((candidate) => candidate.matches(target));
  return rule ? rule.resourceType : 'unknown';
}
