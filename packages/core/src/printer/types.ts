import type { Directive, DirectiveMap, DirectiveType, ExportFormat, Posting } from '@ledgerbridge/shared';
import type { PostingClasses } from '../classifier/index.js';
import type { ResidualBalancer } from '../residual/index.js';

/**
 * What a posting renderer knows beyond the posting itself: the
 * classification of the whole (residual-filled) transaction it belongs to.
 */
export interface PostingContext {
    classes: PostingClasses;
}

/**
 * Renders one posting line, without the trailing newline.
 */
export type PostingRenderer = (posting: Posting, context: PostingContext) => string;

/**
 * Context shared by every directive renderer of one printer.
 */
export interface RenderContext {
    rules: PrinterRules;
    balancer: ResidualBalancer;
}

/**
 * Renders one directive as a record ending in a newline, or as an empty
 * string when the directive has no equivalent.
 */
export type DirectiveRenderer<K extends DirectiveType> = (
    directive: DirectiveMap[K],
    context: RenderContext
) => string;

export type DirectiveRenderers = { [K in DirectiveType]: DirectiveRenderer<K> };

/**
 * Full rule table of one output dialect.
 * A dialect variant is built by copying another table and replacing entries.
 */
export interface PrinterRules {
    name: ExportFormat;
    posting: PostingRenderer;
    directives: DirectiveRenderers;
}

export interface PrinterOptions {
    /** Defaults to fillResidualPosting */
    balancer?: ResidualBalancer;
}

export type Printer = (directive: Directive) => string;
