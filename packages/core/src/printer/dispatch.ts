import type { Directive, DirectiveMap, DirectiveType } from '@ledgerbridge/shared';
import { fillResidualPosting } from '../residual/index.js';
import { formatDate } from '../utils/index.js';
import type { DirectiveRenderers, Printer, PrinterOptions, PrinterRules, RenderContext } from './types.js';

function renderKind<K extends DirectiveType>(
    type: K,
    directive: DirectiveMap[K],
    renderers: DirectiveRenderers,
    context: RenderContext
): string {
    return renderers[type](directive, context);
}

/**
 * Render one directive with the given rule table.
 *
 * Directives of a kind the table does not know (possible only for input
 * that bypassed validation) become a comment line.
 */
export function renderDirective(directive: Directive, context: RenderContext): string {
    const renderers = context.rules.directives;
    if (!Object.hasOwn(renderers, directive.type)) {
        return `;; Unsupported: ${formatDate(directive.date)} ${directive.type}\n`;
    }
    return renderKind(directive.type, directive, renderers, context);
}

/**
 * Build a printer for one dialect.
 *
 * @param rules - Rule table of the dialect
 * @param options - Residual balancer override
 * @returns Function rendering one directive per call
 */
export function createPrinter(rules: PrinterRules, options: PrinterOptions = {}): Printer {
    const context: RenderContext = {
        rules,
        balancer: options.balancer ?? fillResidualPosting,
    };
    return (directive) => renderDirective(directive, context);
}
