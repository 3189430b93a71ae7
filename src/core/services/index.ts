export { type IntentExecutor, ShellIntentExecutor } from "./executor";
export {
  type PlaybookOptions,
  ServiceRecovery,
  type ServiceRecoveryOptions,
} from "./orchestrator";
export { type PortProbe, TcpPortProbe } from "./probe";
