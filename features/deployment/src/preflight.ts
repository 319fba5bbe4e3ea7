import { pathExists } from 'fs-extra';
import type { LoggerLike } from '@bgctl/logger';
import { ConfigMissingError } from '@bgctl/shared';

/** Runs before any command touches the deployment. */
export async function verifyDeploymentFiles(
  files: { envFile: string; composeFile: string },
  logger: LoggerLike,
): Promise<void> {
  logger.info('Validating configuration files...');

  if (!(await pathExists(files.envFile))) {
    throw new ConfigMissingError('Environment file', files.envFile);
  }
  if (!(await pathExists(files.composeFile))) {
    throw new ConfigMissingError('Docker Compose file', files.composeFile);
  }

  logger.success('Configuration files validated.');
}
