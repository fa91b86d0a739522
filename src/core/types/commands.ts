export interface CreateCommandOptions {
  type?: string;
  domain?: string;
  outputDir?: string;
  withDocker?: boolean;
  mcpServer?: boolean;
  deploymentTarget?: string;
  force?: boolean;
  dryRun?: boolean;
  format?: string;
  yes?: boolean;
}

export interface BatchCommandOptions {
  outputDir?: string;
  force?: boolean;
  dryRun?: boolean;
  format?: string;
}

export interface TypesCommandOptions {
  format?: string;
}
