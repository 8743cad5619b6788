export {
  EndpointError,
  PortInUseError,
  ListenerStartError,
  EndpointAlreadyRegisteredError,
  EndpointNotRegisteredError,
  InvalidConfigError,
  InvalidConfigFileError,
  type ConfigIssue,
} from "./catalog.js";
