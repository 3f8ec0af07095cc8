export const HUNK_MARKER = "@@";
export const END_OF_FILE_MARKER = "*** End of File";
export const END_PATCH_MARKER = "*** End Patch";
export const UPDATE_FILE_PREFIX = "*** Update File:";
export const ADD_FILE_PREFIX = "*** Add File:";
export const DELETE_FILE_PREFIX = "*** Delete File:";

export const HUNK_ADD_LINE_PREFIX = "+";
export const HUNK_DELETE_LINE_PREFIX = "-";
export const HUNK_CONTEXT_LINE_PREFIX = " ";

/** Lines that end a patch body (or hand over to the next file in it). */
export const SECTION_TERMINATORS: ReadonlyArray<string> = [
  END_PATCH_MARKER,
  UPDATE_FILE_PREFIX,
  DELETE_FILE_PREFIX,
  ADD_FILE_PREFIX,
];

export const END_SECTION_MARKERS: ReadonlyArray<string> = [
  ...SECTION_TERMINATORS,
  END_OF_FILE_MARKER,
];

export function isHunkMarker(line: string): boolean {
  return line.startsWith(HUNK_MARKER);
}
