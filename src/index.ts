/**
 * Field Rules
 *
 * Declarative field-level validation with presence and mutual-exclusion
 * resolution, catalog-backed messages and a Hono request middleware.
 */

export { Validator, RULE_NULLABLE, type ValidatorOptions, type ValidationReport, type FieldError } from './lib/validation/validator.js';
export { CompiledRules } from './lib/validation/compiled-rules.js';
export { DataAccessor } from './lib/validation/data-accessor.js';
export { parseRule } from './lib/validation/rule-parser.js';
export { RuleRegistry, BUILTIN_RULES, defaultRuleRegistry } from './lib/validation/rule-registry.js';
export { StandardMetaRule, CustomMetaRule, type MetaRule } from './lib/validation/meta-rules.js';
export { NativeFunctions } from './lib/validation/native-functions.js';
export { MessageCatalog, messages, formatMessage, type MessageCatalogOptions } from './lib/validation/messages.js';
export { findCustomMessage } from './lib/validation/custom-messages.js';
export { loadRuleSetYaml, readRuleSetFile, type RuleSet } from './lib/validation/rule-set-yaml.js';
export {
    FieldRequirementConstraints,
    RULE_REQUIRED,
    RULE_REQUIRED_WITHOUT
} from './lib/validation/requirements/field-requirement-constraints.js';
export { RequirementEngine, RequirementOutcome } from './lib/validation/requirements/requirement-engine.js';
export {
    ValidationSystemError,
    ConfigurationError,
    InvalidRuleError,
    UnknownRuleError,
    FieldNotFoundError,
    MessageCatalogError,
    ValidationError,
    RuleViolationError,
    RequiredRuleViolation,
    RequirementError
} from './lib/validation/errors.js';
export type {
    FieldIdentifier,
    FieldPresence,
    RuleDefinition,
    RuleDefinitions,
    RulePredicate,
    RuleSpec,
    CustomMessages
} from './lib/validation/types.js';
export * from './lib/validators/index.js';
export { HttpError, HttpErrors, isHttpError, type HttpErrorBody, type ErrorDetails } from './lib/errors/http-error.js';
export { validateRequest, type ValidationTarget } from './lib/middleware/request-validator.js';
export { ValidationEnv, parseEnvLine, type ValidationEnvSources } from './lib/env/validation-env.js';
export { Logger, logger } from './lib/logger.js';
