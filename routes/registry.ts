import { Router, Request, Response } from "express";
import { allFields, lookup, MTI_MEANINGS } from '../business/registry';
import { FieldDefinition } from '../business/types';
import { HandlerResult } from './decode';

export function handleFieldLookup(param: string): HandlerResult<FieldDefinition> {
    const fieldNumber = Number(param);
    if (!/^\d+$/.test(param) || fieldNumber < 1 || fieldNumber > 128) {
        return { status: 400, payload: { status: `"${param}" is not a field number 1-128` } };
    }
    const def = lookup(fieldNumber);
    if (!def) return { status: 404, payload: { status: `field ${fieldNumber} is not registered` } };
    return { status: 200, payload: def };
}

export function createRegistryRouter(mtiMeanings: Readonly<Record<string, string>> = {}): Router {
    const RegistryRouter: Router = Router();

    RegistryRouter.get("/registry", function (request: Request, response: Response) {
        response.json(allFields());
    });

    RegistryRouter.get("/registry/:number", function (request: Request, response: Response) {
        const result = handleFieldLookup(request.params.number);
        response.status(result.status).json(result.payload);
    });

    RegistryRouter.get("/mti", function (request: Request, response: Response) {
        response.json({ ...MTI_MEANINGS, ...mtiMeanings });
    });

    return RegistryRouter;
}
