// packages/core/src/env/index.ts -- barrel re-export

export { currentHost, describeEnvironment, isMacContext } from './environment.js';
export type {
  CursorPosition,
  DescribeEnvironmentOptions,
  DisplayProbe,
  HostInfo,
  ScreenGeometry,
} from './environment.js';
