export { createCli } from './cli.js'
export { createProcessRuntime, main } from './main.js'
export { connectToServer, getEndpoint, getUserAgent } from './utils/client.js'
export { createResourceCommand, type ResourceCommandSpec } from './commands/resource/index.js'
export { parseFieldList, collectFilters, type ResourceFilterOption } from './commands/resource/options.js'
export * from './output/index.js'
