import type { Session } from './session.js';

/**
 * Claims the logical resources a session type needs and seeds its
 * state. Tags are bookkeeping only; nothing is locked.
 */
export type Allocator = (session: Session) => void | Promise<void>;

export const noopAllocator: Allocator = () => {};

/**
 * Applied to every session before its type-specific allocator.
 */
export const baseAllocator: Allocator = (session) => {
  session.allocate('memory');
  session.allocate('logging');
  session.allocate(`logger_${session.sessionId}`);
};

export const builtinAllocators: Record<string, Allocator> = {
  api_workflow: (session) => {
    session.allocate('api_pool');
    session.stateData.apiClients = {};
  },
  file_processing: (session) => {
    session.allocate('file_handlers');
    session.stateData.fileQueue = [];
    session.stateData.processedFiles = [];
  },
  batch_operation: (session) => {
    session.allocate('batch_processor');
    session.stateData.batchQueue = [];
    session.stateData.batchResults = [];
  },
};

export class AllocatorTable {
  private allocators = new Map<string, Allocator>();

  constructor(extra?: Record<string, Allocator>) {
    for (const [type, allocator] of Object.entries(builtinAllocators)) {
      this.allocators.set(type, allocator);
    }
    for (const [type, allocator] of Object.entries(extra ?? {})) {
      this.allocators.set(type, allocator);
    }
  }

  register(sessionType: string, allocator: Allocator): void {
    this.allocators.set(sessionType, allocator);
  }

  lookup(sessionType: string): Allocator {
    return this.allocators.get(sessionType) ?? noopAllocator;
  }

  async allocate(session: Session): Promise<void> {
    await baseAllocator(session);
    await this.lookup(session.sessionType)(session);
  }
}
