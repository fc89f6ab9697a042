export class TenantDocument {
    constructor(
        public readonly tenantId: string,
        public readonly documentId: string,
        public readonly content: string,
        public readonly metadata: Record<string, unknown>,
        public readonly embedding: number[],
        public readonly createdAt: Date
    ) {}
}
