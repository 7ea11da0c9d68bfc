import { Protocol } from '#protocol'
import type { ResponseBundle, SearchsetBundle, StoredResource, WriteOutcome } from '#protocol'
import { BundleTransactionProcessor } from '../core/bundle'
import { ConditionalOperationCoordinator } from '../core/conditional'
import type { WriteResult } from '../core/conditional'
import { IdentityAssigner } from '../core/identity'
import type { ModelRegistry, ResourceInput, ResourceModel } from '../core/model'
import type { SearchCriteria } from '../core/search'
import { ResourceStore } from '../core/store'
import { resolveServerConfig } from './config'
import type { MockFhirServerConfig, ResolvedServerConfig } from './config'
import type { HandleRequest, HandleResult } from './http'
import { RequestHandler } from './RequestHandler'
import { createRuntimeFactory } from './runtime'
import type { CreateServerRuntime, ServerRuntime } from './runtime'

function unwrap(outcome: WriteResult): WriteOutcome {
    if (!outcome.ok) throw outcome.error
    return Protocol.outcome.write({
        created: outcome.created,
        location: outcome.location,
        resource: outcome.resource,
        diagnostics: outcome.diagnostics
    })
}

/**
 * An in-memory FHIR repository for one test session. The programmatic methods throw `FhirMockError`
 * on failure; `handle` and the fetch handlers turn every failure into an OperationOutcome response.
 */
export class MockFhirServer {
    readonly config: ResolvedServerConfig
    readonly store: ResourceStore
    readonly coordinator: ConditionalOperationCoordinator
    readonly processor: BundleTransactionProcessor
    readonly createRuntime: CreateServerRuntime

    private readonly requestHandler: RequestHandler

    constructor(config: MockFhirServerConfig = {}) {
        this.config = resolveServerConfig(config)
        const logger = this.config.observability.logger

        this.store = new ResourceStore()
        this.coordinator = new ConditionalOperationCoordinator({
            store: this.store,
            baseUrl: this.config.baseUrl,
            identity: new IdentityAssigner(this.config.identity)
        })
        this.processor = new BundleTransactionProcessor({
            coordinator: this.coordinator,
            baseUrl: this.config.baseUrl,
            basePath: this.config.basePath,
            logger
        })
        this.requestHandler = new RequestHandler({
            coordinator: this.coordinator,
            processor: this.processor,
            baseUrl: this.config.baseUrl,
            basePath: this.config.basePath,
            logger
        })
        this.createRuntime = createRuntimeFactory(this.config)
    }

    get baseUrl(): string {
        return this.config.baseUrl
    }

    get models(): ModelRegistry {
        return this.config.models
    }

    createResource(resource: ResourceInput): WriteOutcome {
        return unwrap(this.coordinator.create(resource))
    }

    updateResource(resourceType: string, id: string, resource: ResourceInput): WriteOutcome {
        return unwrap(this.coordinator.update(resourceType, id, resource))
    }

    conditionalCreate(resource: ResourceInput, criteria: string): WriteOutcome {
        const runtime = this.createRuntime()
        return unwrap(this.coordinator.conditionalCreate(resource, criteria, {
            observability: runtime.observabilityContext
        }))
    }

    conditionalUpdate(resourceType: string, resource: ResourceInput, criteria: string): WriteOutcome {
        const runtime = this.createRuntime()
        return unwrap(this.coordinator.conditionalUpdate(resourceType, resource, criteria, {
            observability: runtime.observabilityContext
        }))
    }

    read(resourceType: string, id: string): StoredResource | undefined
    read(resourceType: string, id: string, options: { asModel: true }): ResourceModel | undefined
    read(resourceType: string, id: string, options?: { asModel?: boolean }): StoredResource | ResourceModel | undefined
    read(resourceType: string, id: string, options: { asModel?: boolean } = {}): StoredResource | ResourceModel | undefined {
        const resource = this.store.get(resourceType, id)
        if (!resource) return undefined
        return options.asModel ? this.models.toModel(resource) : resource
    }

    /**
     * Without a factory for the kind, `asModels` falls back to plain documents.
     */
    search(resourceType: string, criteria?: string | SearchCriteria): SearchsetBundle
    search(resourceType: string, criteria: string | SearchCriteria | undefined, options: { asModels: true }): Array<ResourceModel | StoredResource>
    search(
        resourceType: string,
        criteria: string | SearchCriteria = {},
        options: { asModels?: boolean } = {}
    ): SearchsetBundle | Array<ResourceModel | StoredResource> {
        const matches = this.coordinator.search(resourceType, criteria)
        if (!options.asModels) return Protocol.bundle.searchset(this.baseUrl, matches)
        return matches.map(resource => this.models.has(resource.resourceType) ? this.models.toModel(resource) : resource)
    }

    processBundle(bundle: unknown): ResponseBundle {
        const runtime = this.createRuntime()
        return this.processor.process(bundle, {
            observability: runtime.observabilityContext,
            logger: runtime.logger
        })
    }

    handle(request: HandleRequest, runtime: ServerRuntime = this.createRuntime()): HandleResult {
        return this.requestHandler.handle(request, {
            observability: runtime.observabilityContext,
            logger: runtime.logger
        })
    }

    reset(): void {
        this.store.reset()
    }
}
