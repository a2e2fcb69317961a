import { parseJsonInput } from "../entities/sanitize-json.js";
import {
    type AuthorizationDetailsInput,
    AuthorizationDetailsSchema,
} from "./authorization-details.schema.js";

export interface AuthorizationDetailsParser {
    parse(content: string): AuthorizationDetailsInput;
}

export function createAuthorizationDetailsParser(): AuthorizationDetailsParser {
    return {
        parse(content: string): AuthorizationDetailsInput {
            const data = parseJsonInput(
                content,
                "account authorization details file",
            );
            return AuthorizationDetailsSchema.parse(data);
        },
    };
}
