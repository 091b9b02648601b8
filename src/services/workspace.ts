// Wires every service of one repository around a shared store

import * as path from 'path';
import { FileStore } from './storage/file-store.js';
import { IdGenerator } from './id-generator.js';
import { AuditService } from './audit/audit-service.js';
import { ConfigService } from './config/config-service.js';
import { GitTagService } from './git/git-tag-service.js';
import { PromptService } from './prompt/prompt-service.js';
import { ArtifactService } from './artifact/artifact-service.js';
import { LifecycleService } from './lifecycle/lifecycle-service.js';
import { LinkService } from './link/link-service.js';
import { GraphService } from './graph/graph-service.js';
import { ImpactService } from './impact/impact-service.js';
import { PlaybookService } from './playbook/playbook-service.js';
import { VerifyService } from './verify/verify-service.js';

/**
 * Store directory inside a repository
 */
export const AIR_DIRECTORY = '.air';

export interface Workspace {
  /** Repository root */
  root: string;
  /** `<root>/.air` */
  storeDir: string;
  fileStore: FileStore;
  idGenerator: IdGenerator;
  auditService: AuditService;
  configService: ConfigService;
  gitTagService: GitTagService;
  promptService: PromptService;
  artifacts: ArtifactService;
  lifecycle: LifecycleService;
  links: LinkService;
  graph: GraphService;
  impact: ImpactService;
  playbook: PlaybookService;
  verify: VerifyService;
}

/**
 * Opens the tracker rooted at `root`. Nothing is read until a service is used.
 */
export function openWorkspace(root: string = process.cwd()): Workspace {
  const storeDir = path.join(root, AIR_DIRECTORY);

  const fileStore = new FileStore({ baseDir: storeDir });
  const idGenerator = new IdGenerator(root);
  const auditService = new AuditService({ baseDir: storeDir });
  const configService = new ConfigService({ baseDir: storeDir });
  const gitTagService = new GitTagService(root);
  const playbook = new PlaybookService({ fileStore, idGenerator, auditService });

  return {
    root,
    storeDir,
    fileStore,
    idGenerator,
    auditService,
    configService,
    gitTagService,
    promptService: new PromptService(root),
    artifacts: new ArtifactService({ fileStore, idGenerator, auditService, configService }),
    lifecycle: new LifecycleService({ fileStore, auditService, configService, gitTagService }),
    links: new LinkService({ fileStore, auditService }),
    graph: new GraphService(fileStore),
    impact: new ImpactService(fileStore),
    playbook,
    verify: new VerifyService({ fileStore, configService, playbook })
  };
}
