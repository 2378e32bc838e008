import type {
  DescriptorSource,
  RawRouteDescriptor,
  RawSchemaDescriptor,
} from '../ir/descriptors.js';

/**
 * Descriptor source over plain arrays, for hosts that introspect their own
 * routes and for tests
 */
export class StaticDescriptorSource implements DescriptorSource {
  constructor(
    private readonly routes: readonly RawRouteDescriptor[],
    private readonly schemas: readonly RawSchemaDescriptor[] = []
  ) {}

  enumerateRoutes(): RawRouteDescriptor[] {
    return [...this.routes];
  }

  enumerateSchemas(): RawSchemaDescriptor[] {
    return [...this.schemas];
  }
}
