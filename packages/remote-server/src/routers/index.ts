export * as WorkflowRouter from './workflow/workflow.js'
