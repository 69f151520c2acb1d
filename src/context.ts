/**
 * Composition root: builds the engine and its collaborators from config
 */

import { assertDirectoryConfigured, type AppConfig } from "./config.js";
import { KyselyMirrorStore } from "./db/mirror-store.js";
import { ScimClient } from "./directory/client.js";
import { AccessTokenProvider } from "./directory/token.js";
import { KyselyMirrorReader } from "./server/services/mirror.service.js";
import {
  ChangeNotifier,
  MembershipEditor,
  SyncOrchestrator,
  SyncScheduler,
} from "./services/sync/index.js";

import type { Database } from "./db/types.js";
import type { Kysely } from "kysely";

export interface AppContext {
  config: AppConfig;
  directory: ScimClient;
  store: KyselyMirrorStore;
  mirror: KyselyMirrorReader;
  notifier: ChangeNotifier;
  orchestrator: SyncOrchestrator;
  scheduler: SyncScheduler;
  editor: MembershipEditor;
}

export function createAppContext(
  config: AppConfig,
  db: Kysely<Database>
): AppContext {
  assertDirectoryConfigured(config.directory);

  const tokens = new AccessTokenProvider({
    tokenUrl: config.directory.tokenUrl,
    clientId: config.directory.clientId,
    clientSecret: config.directory.clientSecret,
    requestTimeoutMs: config.directory.requestTimeoutMs,
  });
  const directory = new ScimClient(config.directory, tokens);
  const store = new KyselyMirrorStore(db);
  const notifier = new ChangeNotifier();
  const orchestrator = new SyncOrchestrator({
    reader: directory,
    store,
    notifier,
  });

  return {
    config,
    directory,
    store,
    mirror: new KyselyMirrorReader(db),
    notifier,
    orchestrator,
    scheduler: new SyncScheduler(orchestrator),
    editor: new MembershipEditor(directory, store, store),
  };
}
