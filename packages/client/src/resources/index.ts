import { createRegistryCatalog, type RegistryCatalog, type ResourceDefinition } from '../fields/registry.js'
import { imageResource } from './image.js'
import { jobResource } from './job.js'
import { keypairResourcePolicyResource } from './keypair-resource-policy.js'
import { scalingGroupResource } from './scaling-group.js'
import { userResource } from './user.js'

export { imageResource, jobResource, keypairResourcePolicyResource, scalingGroupResource, userResource }

export const builtinResources: readonly ResourceDefinition[] = [
  jobResource,
  userResource,
  imageResource,
  scalingGroupResource,
  keypairResourcePolicyResource,
]

/** Build a fresh catalog of the built-in resource kinds */
export function createBuiltinCatalog(): RegistryCatalog {
  return createRegistryCatalog(builtinResources)
}
