import { AppConfig, ToolsConfig } from '../config/types.js';
import { DiscoveryService } from '../services/scan/discoveryService.js';
import { FdEnumerator } from '../services/scan/fdEnumerator.js';
import { OutputStream } from './presenters/taggingPresenter.js';
import { Theme } from './theme.js';

/**
 * Everything a command needs from the outside world
 */
export interface CliContext {
  config: AppConfig;
  theme: Theme;
  out: OutputStream;
}

export function createDiscovery(tools: ToolsConfig): DiscoveryService {
  return new DiscoveryService(tools.useFd ? new FdEnumerator(tools.fdPath) : undefined);
}
