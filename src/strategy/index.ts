export {
  createScriptedStrategy,
  parseDeploymentPlan,
  type DeploymentPlan,
  type DeploymentStep,
} from './scripted';
export {
  HELP_TEXT,
  applyCommand,
  createConsoleIO,
  createInteractiveStrategy,
  parseCommand,
  type Command,
  type CommandIO,
} from './interactive';
