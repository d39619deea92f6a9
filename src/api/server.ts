import Fastify, { FastifyInstance } from 'fastify';
import {
  InvalidTransitionError,
  PROPOSAL_STATES,
  ProposalInputError,
  ProposalNotFoundError,
  ProposalState,
  QuorumUndefinedError,
  ReviewDecision,
  ReviewError,
} from '../types';
import { ProposalStore } from '../proposals/proposal-store';
import { renderProposalDocument } from '../proposals/proposal-document';
import { ApprovalGate } from '../governance/approval-gate';
import { ProposalService, ProposedChange } from '../governance/proposal-service';
import { PatchApplier } from '../apply/patch-applier';

export interface GovernanceServerDeps {
  store: ProposalStore;
  service: ProposalService;
  gate: ApprovalGate;
  applier: PatchApplier;
}

export interface GovernanceServerOptions {
  logger?: boolean;
}

const nonEmptyString = { type: 'string', minLength: 1 } as const;

const idParams = {
  type: 'object',
  required: ['id'],
  properties: { id: nonEmptyString },
} as const;

/**
 * Fastify server exposing the governance pipeline over HTTP
 */
export class GovernanceServer {
  private app: FastifyInstance;

  constructor(
    private readonly deps: GovernanceServerDeps,
    options: GovernanceServerOptions = {}
  ) {
    this.app = Fastify({
      logger: options.logger ?? true,
    });

    this.setupErrorHandler();
    this.setupRoutes();
  }

  private setupErrorHandler(): void {
    this.app.setErrorHandler((error, request, reply) => {
      if (error instanceof ProposalNotFoundError) {
        return reply.status(404).send({ error: error.name, message: error.message });
      }
      if (error instanceof InvalidTransitionError || error instanceof ReviewError) {
        return reply.status(409).send({ error: error.name, message: error.message });
      }
      if (error instanceof ProposalInputError || error.validation) {
        return reply.status(400).send({ error: 'ValidationError', message: error.message });
      }
      if (error instanceof QuorumUndefinedError) {
        request.log.error({ groupSize: error.groupSize }, 'Review quorum is not configured');
      } else {
        request.log.error(error, 'Unhandled error');
      }
      return reply.status(error.statusCode ?? 500).send({ error: error.name, message: error.message });
    });
  }

  private setupRoutes(): void {
    const { store, service, gate, applier } = this.deps;

    this.app.get('/health', async () => {
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version || '0.1.0',
      };
    });

    this.app.post<{ Body: { path: string } }>(
      '/api/classify',
      {
        schema: {
          body: { type: 'object', required: ['path'], properties: { path: nonEmptyString } },
        },
      },
      async (request) => service.classify(request.body.path)
    );

    this.app.get<{ Querystring: { state?: ProposalState } }>(
      '/api/proposals',
      {
        schema: {
          querystring: {
            type: 'object',
            properties: { state: { type: 'string', enum: [...PROPOSAL_STATES] } },
          },
        },
      },
      async (request) => {
        const proposals = await store.list(request.query.state);
        return { proposals };
      }
    );

    this.app.get<{ Params: { id: string } }>(
      '/api/proposals/:id',
      { schema: { params: idParams } },
      async (request) => {
        const proposal = await store.get(request.params.id);
        if (!proposal) throw new ProposalNotFoundError(request.params.id);
        return proposal;
      }
    );

    this.app.get<{ Params: { id: string } }>(
      '/api/proposals/:id/document',
      { schema: { params: idParams } },
      async (request, reply) => {
        const proposal = await store.get(request.params.id);
        if (!proposal) throw new ProposalNotFoundError(request.params.id);
        reply.type('text/markdown; charset=utf-8');
        return renderProposalDocument(proposal);
      }
    );

    this.app.post<{
      Body: { proposer?: string; summary: string; changeType?: string; changes: ProposedChange[] };
    }>(
      '/api/proposals',
      {
        schema: {
          body: {
            type: 'object',
            required: ['summary', 'changes'],
            properties: {
              proposer: { type: 'string' },
              summary: nonEmptyString,
              changeType: { type: 'string' },
              changes: {
                type: 'array',
                minItems: 1,
                items: {
                  type: 'object',
                  required: ['path', 'newContent'],
                  properties: { path: nonEmptyString, newContent: { type: 'string' } },
                },
              },
            },
          },
        },
      },
      async (request, reply) => {
        const result = await service.propose(request.body);
        if (result.status === 'created') {
          reply.status(201);
        }
        return result;
      }
    );

    this.app.post<{ Body: { document: string } }>(
      '/api/proposals/import',
      {
        schema: {
          body: { type: 'object', required: ['document'], properties: { document: nonEmptyString } },
        },
      },
      async (request, reply) => {
        const result = await service.importDocument(request.body.document);
        if (result.status === 'created') {
          reply.status(201);
        }
        return result;
      }
    );

    this.app.post<{ Params: { id: string }; Body: { requestingNode: string } }>(
      '/api/proposals/:id/review',
      {
        schema: {
          params: idParams,
          body: {
            type: 'object',
            required: ['requestingNode'],
            properties: { requestingNode: nonEmptyString },
          },
        },
      },
      async (request, reply) => {
        const review = await gate.requestReview(request.params.id, request.body.requestingNode);
        reply.status(201);
        return review;
      }
    );

    this.app.post<{ Params: { id: string }; Body: { actor: string } }>(
      '/api/proposals/:id/approve',
      {
        schema: {
          params: idParams,
          body: { type: 'object', required: ['actor'], properties: { actor: nonEmptyString } },
        },
      },
      async (request, reply) => {
        const outcome = await gate.approve(request.params.id, request.body.actor);
        if (!outcome.promoted) {
          reply.status(409);
        }
        return outcome;
      }
    );

    this.app.post<{ Params: { id: string }; Body: { reviewer: string; decision: ReviewDecision } }>(
      '/api/proposals/:id/reviews',
      {
        schema: {
          params: idParams,
          body: {
            type: 'object',
            required: ['reviewer', 'decision'],
            properties: {
              reviewer: nonEmptyString,
              decision: { type: 'string', enum: ['approve', 'reject'] },
            },
          },
        },
      },
      async (request) =>
        gate.recordReview(request.params.id, request.body.reviewer, request.body.decision)
    );

    this.app.post<{ Params: { id: string }; Body: { actor: string; reason: string } }>(
      '/api/proposals/:id/reject',
      {
        schema: {
          params: idParams,
          body: {
            type: 'object',
            required: ['actor', 'reason'],
            properties: { actor: nonEmptyString, reason: nonEmptyString },
          },
        },
      },
      async (request) => gate.reject(request.params.id, request.body.actor, request.body.reason)
    );

    this.app.delete<{ Params: { id: string } }>(
      '/api/proposals/:id',
      { schema: { params: idParams } },
      async (request, reply) => {
        const { id } = request.params;
        const proposal = await store.get(id);
        if (!proposal) throw new ProposalNotFoundError(id);

        if (!(await store.delete(id))) {
          const current = (await store.get(id)) ?? proposal;
          return reply.status(409).send({
            error: 'InvalidTransition',
            message: `Proposal ${id} is ${current.state}; only pending proposals can be deleted`,
          });
        }

        return reply.status(204).send();
      }
    );

    this.app.post<{ Body: { proposalId?: string; dryRun?: boolean } }>(
      '/api/apply',
      {
        schema: {
          body: {
            type: 'object',
            properties: {
              proposalId: nonEmptyString,
              dryRun: { type: 'boolean' },
            },
          },
        },
      },
      async (request, reply) => {
        const dryRun = request.body?.dryRun ?? false;
        const proposalId = request.body?.proposalId;

        if (!proposalId) {
          return applier.applyAll({ dryRun });
        }

        const result = await applier.apply(proposalId, { dryRun });
        if (!result.ok) {
          reply.status(
            result.error === 'ProposalNotFound'
              ? 404
              : result.error === 'InvalidTransition' || result.error === 'RepositoryMismatch'
                ? 409
                : 422
          );
        }
        return result;
      }
    );
  }

  async start(port: number = 3000): Promise<void> {
    try {
      await this.app.listen({ port, host: '0.0.0.0' });
      console.log(`[Server] Governance API listening on port ${port}`);
    } catch (err) {
      this.app.log.error(err);
      process.exit(1);
    }
  }

  async stop(): Promise<void> {
    await this.app.close();
  }

  getApp(): FastifyInstance {
    return this.app;
  }
}
