import {xmlEscape, xmlEscapeText} from './helpers'
import type {SerializeOptions, XmlDocument, XmlElement} from './types'

export const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>'

function qualify(prefix: string | null, name: string): string {
	return prefix ? `${prefix}:${name}` : name
}

function openTag(el: XmlElement): string {
	let tag = `<${qualify(el.prefix, el.name)}`
	for (const ns of el.namespaces) {
		tag += ns.prefix
			? ` xmlns:${ns.prefix}="${xmlEscape(ns.uri)}"`
			: ` xmlns="${xmlEscape(ns.uri)}"`
	}
	for (const attr of el.attributes) {
		tag += ` ${qualify(attr.prefix, attr.name)}="${xmlEscape(attr.value)}"`
	}
	return tag
}

interface Frame {
	readonly depth: number
	readonly element: XmlElement
	// No line breaks inside: flat output, or mixed content
	readonly inline: boolean
	next: number
}

/**
 * Render a decoded document as XML text. Namespace declarations are written
 * on the element whose scope they open. With `indent`, each element goes on
 * its own line; elements holding text stay on one line.
 */
export function serializeDocument(
	doc: XmlDocument,
	options: SerializeOptions = {}
): string {
	const indent = options.indent ?? ''
	const pretty = indent.length > 0
	const out: string[] = []
	if (options.declaration) out.push(`${XML_DECLARATION}\n`)

	// Iterative walk so document depth never reaches the call stack
	const stack: Frame[] = []
	const enter = (el: XmlElement, depth: number, inline: boolean): void => {
		if (pretty && !inline && depth > 0) out.push(`\n${indent.repeat(depth)}`)
		if (el.children.length === 0) {
			out.push(`${openTag(el)}/>`)
			return
		}
		out.push(`${openTag(el)}>`)
		stack.push({
			element: el,
			depth,
			inline: !pretty || inline || el.children.some(c => c.kind === 'text'),
			next: 0
		})
	}

	enter(doc.root, 0, false)
	for (let frame = stack.at(-1); frame; frame = stack.at(-1)) {
		const child = frame.element.children[frame.next++]
		if (child === undefined) {
			stack.pop()
			if (!frame.inline) out.push(`\n${indent.repeat(frame.depth)}`)
			out.push(`</${qualify(frame.element.prefix, frame.element.name)}>`)
		} else if (child.kind === 'text') {
			out.push(xmlEscapeText(child.value))
		} else {
			enter(child, frame.depth + 1, frame.inline)
		}
	}

	return out.join('')
}
