export { launch, type LaunchOptions } from './run';
export { prepareLaunchEnvironment } from './prepare';
export { formatExports, quoteShellValue } from './exports';
