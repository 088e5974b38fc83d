/**
 * `${NAME}` substitution for manual templates
 *
 * Names resolve against the manual's `variables` first, then the process
 * environment. A template with any unresolved name fails as a whole, and
 * substituted values are never re-scanned.
 */

import _ from 'lodash';
import { SubstitutionError } from '../errors.js';

const PLACEHOLDER_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export type Environment = Record<string, string | undefined>;

export class VariableSubstitutor {
    constructor(
        private readonly variables: Record<string, string>,
        private readonly env: Environment = process.env
    ) {}

    /**
     * Distinct placeholder names referenced by `template`, in order of first use
     */
    static referencedNames(template: string): string[] {
        return _.uniq(_.map([...template.matchAll(PLACEHOLDER_PATTERN)], match => match[1] ?? ''));
    }

    resolve(name: string): string | undefined {
        if(_.has(this.variables, name)) {
            return this.variables[name];
        }
        return this.env[name];
    }

    /**
     * @param field - what the template is, used in the error (e.g. "URL")
     * @throws SubstitutionError naming the first unresolved variable
     */
    substitute(template: string, field?: string): string {
        const values = new Map<string, string>();
        for(const name of VariableSubstitutor.referencedNames(template)) {
            const value = this.resolve(name);
            if(value === undefined) {
                throw new SubstitutionError(name, field);
            }
            values.set(name, value);
        }

        return _.replace(template, PLACEHOLDER_PATTERN, (placeholder: string, name: string) => values.get(name) ?? placeholder);
    }

    /**
     * Substitute every value of `templates`; keys are left as they are
     */
    substituteRecord(templates: Record<string, string>, field?: string): Record<string, string> {
        return _.mapValues(templates, (template, key) => this.substitute(template, field ? `${field} ${key}` : key));
    }
}
