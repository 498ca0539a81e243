/**
 * consoleClient.ts: Wires every component onto one ConsoleSession.
 *
 * Each ConsoleClient owns its own session (and therefore its own cookies);
 * run concurrent workflows with separate clients, each logged in on its own.
 */

import { ConsoleSession, type SessionOptions } from './core/consoleSession';
import { loadDriverConfig, type DriverConfig } from './core/types';
import type { ConsoleParser } from './parsers/baseParser';
import { FossologyConsoleParser } from './parsers/fossologyParser';
import { SessionManager } from './agents/sessionManager';
import { FolderUploadLocator } from './agents/folderUploadLocator';
import { UploadManager } from './agents/uploadManager';
import { AgentOrchestrator } from './agents/agentOrchestrator';
import { ReportRetriever } from './agents/reportRetriever';
import { BulkTextMatcher } from './agents/bulkTextMatch';

export interface ClientOptions extends SessionOptions {
  parser?: ConsoleParser;
}

export class ConsoleClient {
  readonly config: DriverConfig;
  readonly session: ConsoleSession;
  readonly parser: ConsoleParser;

  readonly auth: SessionManager;
  readonly locator: FolderUploadLocator;
  readonly uploads: UploadManager;
  readonly agents: AgentOrchestrator;
  readonly reports: ReportRetriever;
  readonly bulk: BulkTextMatcher;

  /**
   * @param config - Driver settings; read from the environment when omitted.
   * @param options - Inject a request function or parser (tests).
   */
  constructor(config: DriverConfig = loadDriverConfig(), options: ClientOptions = {}) {
    this.config = config;
    this.session = new ConsoleSession(config, options);
    this.parser = options.parser ?? new FossologyConsoleParser();

    this.auth = new SessionManager(this.session);
    this.locator = new FolderUploadLocator(this.session, this.parser, config.maxListPages);
    this.uploads = new UploadManager(this.session, this.parser);
    this.agents = new AgentOrchestrator(this.session, this.parser, {
      pollIntervalMs: config.pollIntervalMs,
      agentTimeoutMs: config.agentTimeoutMs,
      maxListPages: config.maxListPages,
    });
    this.reports = new ReportRetriever(this.session, this.agents);
    this.bulk = new BulkTextMatcher(this.session);
  }

  async login(): Promise<void> {
    await this.auth.loginWithConfig(this.config);
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}
