export * as Cli from './Cli.js'
export * as Commands from './Commands.js'
export * as Config from './Config.js'
export * as Errors from './Errors.js'
export * as LocalExecutor from './LocalExecutor.js'
export * as Manifest from './Manifest.js'
export * as Runner from './Runner.js'
export * as Workflow from './Workflow.js'
