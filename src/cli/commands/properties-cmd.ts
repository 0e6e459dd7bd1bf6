import { ITEM_PROPERTIES, SPAN_PROPERTIES } from '../../layout/properties.js'
import { colors } from '../ui.js'

export function propertiesCommand(): string {
    return SPAN_PROPERTIES.map((name) => (ITEM_PROPERTIES.has(name) ? `${name} ${colors.dim('(item)')}` : name)).join('\n')
}
