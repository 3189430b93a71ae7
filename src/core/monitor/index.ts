export { collectServiceHealth } from "./health-collector";
export {
  DEFAULT_FAILURE_THRESHOLD,
  RecoveryMonitor,
  type RecoveryMonitorOptions,
  type RecoveryPointSource,
} from "./recovery-monitor";
