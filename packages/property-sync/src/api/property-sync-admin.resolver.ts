import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import {
    Allow,
    Ctx,
    Permission,
    RequestContext,
    Transaction,
} from '@vendure/core';

import { CreateSubEntityInput } from '../events';
import {
    CreateMasterInput,
    CreatePropertyInput,
    MasterService,
    PropertyService,
    SubEntityService,
} from '../services';

/**
 * Admin API resolver for masters, properties and sub-entities.
 */
@Resolver()
export class PropertySyncAdminResolver {
    constructor(
        private masterService: MasterService,
        private propertyService: PropertyService,
        private subEntityService: SubEntityService,
    ) { }

    @Query()
    @Allow(Permission.SuperAdmin)
    async master(
        @Ctx() ctx: RequestContext,
        @Args() args: { id: string },
    ) {
        return this.masterService.findOne(ctx, args.id);
    }

    @Query()
    @Allow(Permission.SuperAdmin)
    async property(
        @Ctx() ctx: RequestContext,
        @Args() args: { id: string },
    ) {
        return this.propertyService.findOne(ctx, args.id);
    }

    @Query()
    @Allow(Permission.SuperAdmin)
    async properties(
        @Ctx() ctx: RequestContext,
        @Args() args: { masterId: string },
    ) {
        return this.propertyService.findByMaster(ctx, args.masterId);
    }

    @Query()
    @Allow(Permission.SuperAdmin)
    async subEntity(
        @Ctx() ctx: RequestContext,
        @Args() args: { id: string },
    ) {
        return this.subEntityService.findOne(ctx, args.id);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.SuperAdmin)
    async createMaster(
        @Ctx() ctx: RequestContext,
        @Args() args: { input: CreateMasterInput },
    ) {
        return this.masterService.create(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.SuperAdmin)
    async createProperty(
        @Ctx() ctx: RequestContext,
        @Args() args: { input: CreatePropertyInput },
    ) {
        return this.propertyService.create(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.SuperAdmin)
    async createSubEntity(
        @Ctx() ctx: RequestContext,
        @Args() args: { input: CreateSubEntityInput },
    ) {
        return this.subEntityService.create(ctx, args.input);
    }
}
