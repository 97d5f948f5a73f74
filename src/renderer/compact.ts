import { COMPACT_MARKERS, type PubIdView, type Qualifiers } from "../model/qualifiers.js";

/** "pt1r4", "Cv1" style markers glued to the document number. */
export function compactMarkers(qualifiers: Qualifiers): string {
	return COMPACT_MARKERS.map((rule) => {
		const value = qualifiers[rule.kind];
		return value === undefined ? "" : `${rule.marker}${value}`;
	}).join("");
}

export function renderShort(view: PubIdView): string {
	const stage = view.stage === undefined ? "" : `(${view.stage})`;
	let text = `${view.publisher} ${view.series.code}${stage} ${view.docnumber}${compactMarkers(view)}`;
	if (view.addendum !== undefined) {
		text += view.addendum === 1 ? " Addendum" : ` Addendum ${view.addendum}`;
	}
	if (view.update) {
		text += `/Upd ${view.update.number}:${view.update.date}`;
	}
	if (view.translation) {
		text += `(${view.translation})`;
	}
	return text;
}

export function renderMachineReadable(view: PubIdView): string {
	const fields = [view.publisher, ...view.series.code.split(" ")];
	if (view.stage !== undefined) fields.push(view.stage);
	fields.push(`${view.docnumber}${compactMarkers(view)}`);
	if (view.addendum !== undefined) fields.push(`add-${view.addendum}`);
	if (view.update) fields.push(`u${view.update.number}-${view.update.date}`);

	const translation = view.translation ? `(${view.translation})` : "";
	return `${fields.join(".")}${translation}`;
}
