/**
 * DefaultGrouper - one line (or bar) panel per variable, equal widths
 */

import { GrouperKind } from '../../types.js';
import { StratGrouper } from './grouper.js';

export class DefaultGrouper extends StratGrouper {
    protected variant(): GrouperKind {
        return 'default';
    }
}
