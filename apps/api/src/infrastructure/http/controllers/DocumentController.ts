import { Router, type Request, type Response } from 'express';
import { ingestDocumentSchema, tenantParamsSchema, type IngestDocumentRequest } from '@hybrid-retrieval/types';
import { IngestDocument } from '../../../application/useCases/IngestDocument';
import { DeleteTenantDocuments } from '../../../application/useCases/DeleteTenantDocuments';
import type { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';

export class DocumentController implements Controller {
    public path = '/documents';
    public router: Router = Router();

    constructor(
        private ingestDocument: IngestDocument,
        private deleteTenantDocuments: DeleteTenantDocuments
    ) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(`${this.path}`, validateRequest(ingestDocumentSchema), this.create.bind(this));
        this.router.delete(`${this.path}/:tenantId`, this.deleteByTenant.bind(this));
    }

    async create(req: Request, res: Response) {
        const document: IngestDocumentRequest = req.body;
        const response = await this.ingestDocument.execute(document);
        res.status(201).json(response);
    }

    async deleteByTenant(req: Request, res: Response) {
        const { tenantId } = tenantParamsSchema.parse(req.params);
        const response = await this.deleteTenantDocuments.execute(tenantId);
        res.json(response);
    }
}
