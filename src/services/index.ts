/**
 * Services Index
 *
 * Wires every service to one store and one notification sender.
 */

import type { AppConfig } from "../shared/config";
import type { HavenStore } from "../shared/store/types";
import { AlertService } from "./alert.service";
import { CommunicationService } from "./communication.service";
import { DiscoveryService } from "./discovery.service";
import { GoogleDistanceMatrixProvider, type DistanceProvider } from "./distance.service";
import { GoogleGeocoder, type Geocoder } from "./geocoding.service";
import { MatchingService } from "./matching.service";
import {
  HttpNotificationSender,
  NotificationDispatcher,
  type NotificationSender,
} from "./notification.service";
import { OrchestratorService } from "./orchestrator.service";
import { RetryService } from "./retry.service";
import { VerificationService } from "./verification.service";

export interface ServiceDependencies {
  store: HavenStore;
  config: AppConfig;
  sender?: NotificationSender;
  /** null disables the distance matrix; undefined builds one from GOOGLE_API_KEY */
  distanceProvider?: DistanceProvider | null;
  geocoder?: Geocoder | null;
}

export interface HavenServices {
  store: HavenStore;
  dispatcher: NotificationDispatcher;
  discovery: DiscoveryService;
  matching: MatchingService;
  communications: CommunicationService;
  retry: RetryService;
  alerts: AlertService;
  verification: VerificationService;
  orchestrator: OrchestratorService;
  geocoder: Geocoder | null;
}

export function createServices(deps: ServiceDependencies): HavenServices {
  const { store, config } = deps;
  const apiKey = config.googleApiKey;

  const sender =
    deps.sender ?? new HttpNotificationSender(config.gateways, config.httpTimeoutMs);
  const distanceProvider =
    deps.distanceProvider !== undefined
      ? deps.distanceProvider
      : apiKey
        ? new GoogleDistanceMatrixProvider(apiKey, config.httpTimeoutMs)
        : null;
  const geocoder =
    deps.geocoder !== undefined
      ? deps.geocoder
      : apiKey
        ? new GoogleGeocoder(apiKey, config.httpTimeoutMs)
        : null;

  const dispatcher = new NotificationDispatcher(sender);
  const discovery = new DiscoveryService(store.hospitals, config.discovery.cacheTtlSeconds);
  const matching = new MatchingService(discovery);
  const communications = new CommunicationService(store, sender, dispatcher, {
    maxAttempts: config.communication.maxAttempts,
  });
  const retry = new RetryService(store, communications, config.communication);
  const alerts = new AlertService(store, geocoder, {
    duplicateWindowMinutes: config.alerts.duplicateWindowMinutes,
  });
  const verification = new VerificationService(store, alerts, sender, {
    codeTtlMinutes: config.alerts.verificationCodeTtlMinutes,
  });
  const orchestrator = new OrchestratorService(
    store,
    alerts,
    verification,
    discovery,
    communications,
    distanceProvider,
    config.orchestrator
  );

  return {
    store,
    dispatcher,
    discovery,
    matching,
    communications,
    retry,
    alerts,
    verification,
    orchestrator,
    geocoder,
  };
}

export type { HospitalMatch, MatchRequest } from "./matching.service";
export type { DispatchResult } from "./orchestrator.service";
