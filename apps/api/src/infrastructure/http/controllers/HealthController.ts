import { Router, type Request, type Response } from 'express';
import { CheckHealth } from '../../../application/useCases/CheckHealth';
import type { Controller } from '../interfaces/Controller';

export class HealthController implements Controller {
    public path = '/health';
    public router: Router = Router();

    constructor(private checkHealth: CheckHealth) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.get(`${this.path}`, this.handle.bind(this));
    }

    async handle(_req: Request, res: Response) {
        const health = await this.checkHealth.execute();
        res.status(health.status === 'healthy' ? 200 : 503).json(health);
    }
}
