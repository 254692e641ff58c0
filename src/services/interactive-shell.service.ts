import { input } from "@inquirer/prompts";

import { ERROR_MESSAGES, MENU_ENTRIES, MENU_OPTIONS, MENU_TITLE } from "../constants";
import { isForkSyncError } from "../errors";
import { isPromptExitError } from "../utils/error-message";
import { parseSelection } from "../utils/selection";

import { Logger } from "./logger.service";

import type { BranchCatalogService } from "./branch-catalog.service";
import type { ForkCatalogService } from "./fork-catalog.service";
import type { SyncEngineService } from "./sync-engine.service";
import type { Fork } from "../types";

export type AskFn = (config: { message: string }) => Promise<string>;

export interface InteractiveShellDependencies {
  forkCatalog: ForkCatalogService;
  branchCatalog: BranchCatalogService;
  syncEngine: SyncEngineService;
  logger?: Logger;
  ask?: AskFn;
}

export class InteractiveShellService {
  private readonly forkCatalog: ForkCatalogService;
  private readonly branchCatalog: BranchCatalogService;
  private readonly syncEngine: SyncEngineService;
  private readonly logger: Logger;
  private readonly ask: AskFn;

  constructor(dependencies: InteractiveShellDependencies) {
    this.forkCatalog = dependencies.forkCatalog;
    this.branchCatalog = dependencies.branchCatalog;
    this.syncEngine = dependencies.syncEngine;
    this.logger = dependencies.logger ?? Logger.createDefault();
    this.ask = dependencies.ask ?? input;
  }

  /** Runs the menu loop until the exit option is chosen or the prompt is aborted. */
  async run(): Promise<void> {
    try {
      let keepRunning = true;
      while (keepRunning) {
        this.displayMenu();
        const choice = await this.ask({ message: "Enter your choice:" });
        keepRunning = await this.handleChoice(choice);
      }
    } catch (error) {
      if (!isPromptExitError(error)) {
        throw error;
      }
      this.logger.success("Exiting GitHub Fork Management.");
    }
  }

  displayMenu(): void {
    this.logger.plain(`\n${MENU_TITLE}`);
    for (const entry of MENU_ENTRIES) {
      this.logger.plain(entry);
    }
  }

  /**
   * Dispatches one menu answer.
   * @returns false once the exit option has been chosen
   */
  async handleChoice(choice: string): Promise<boolean> {
    switch (choice.trim()) {
      case MENU_OPTIONS.LIST_FORKS:
        await this.listForks();
        return true;
      case MENU_OPTIONS.LIST_BRANCHES:
        await this.listBranches();
        return true;
      case MENU_OPTIONS.SYNC_ONE:
        await this.syncSelectedFork();
        return true;
      case MENU_OPTIONS.SYNC_ALL:
        await this.syncEngine.syncAll();
        return true;
      case MENU_OPTIONS.EXIT:
        this.logger.success("Exiting GitHub Fork Management.");
        return false;
      default:
        this.logger.error(ERROR_MESSAGES.INVALID_CHOICE);
        return true;
    }
  }

  private async listForks(): Promise<void> {
    const forks = await this.fetchForks();
    if (forks) {
      this.printForks(forks);
    }
  }

  private async listBranches(): Promise<void> {
    const repoName = await this.ask({ message: "Enter the full name of the fork (e.g., user/repo):" });
    const result = await this.branchCatalog.listBranches(repoName);

    if (!result.ok) {
      this.logger.error("Failed to list branches:", result.error);
      return;
    }
    if (result.items.length === 0) {
      this.logger.error(ERROR_MESSAGES.NO_BRANCHES);
      return;
    }
    for (const branch of result.items) {
      this.logger.success(`- ${branch.name}`);
    }
  }

  private async syncSelectedFork(): Promise<void> {
    const forks = await this.fetchForks();
    if (!forks) return;

    this.printForks(forks);

    const answer = await this.ask({ message: "Select a fork to sync (enter number):" });
    let fork: Fork;
    try {
      fork = forks[parseSelection(answer, forks.length)];
    } catch (error) {
      if (!isForkSyncError(error)) throw error;
      this.logger.error(ERROR_MESSAGES.INVALID_SELECTION);
      this.logger.debug(error.message);
      return;
    }

    if (!fork.parentFullName) {
      this.logger.warn(ERROR_MESSAGES.NO_UPSTREAM);
      return;
    }
    await this.syncEngine.syncOne(fork, fork.parentFullName);
  }

  /** Forks to show, or undefined after reporting an empty or failed listing. */
  private async fetchForks(): Promise<Fork[] | undefined> {
    const result = await this.forkCatalog.listForks();
    if (!result.ok) {
      this.logger.error("Failed to list forks:", result.error);
      return undefined;
    }
    if (result.items.length === 0) {
      this.logger.error(ERROR_MESSAGES.NO_FORKS);
      return undefined;
    }
    return result.items;
  }

  private printForks(forks: Fork[]): void {
    forks.forEach((fork, index) => {
      this.logger.success(`${index + 1}. ${fork.fullName}`);
    });
  }
}
