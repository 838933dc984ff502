import { TextSelection } from '../types';

export function caretAt(offset: number): TextSelection {
	return { start: offset, end: offset };
}
