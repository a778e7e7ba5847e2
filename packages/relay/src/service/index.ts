export {
  RelayService,
  type RelayServiceOptions,
  type RelayIdentity,
  type RelayStatus,
} from './relay-service.js';
