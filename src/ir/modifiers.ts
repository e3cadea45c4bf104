/**
 * @file modifiers.ts
 * @description Layout qualifiers and declaration modifiers attached to variables, fields and functions.
 */

/** Bits of Layout.flags */
export const LayoutFlag = {
  originUpperLeft: 1 << 0,
  pushConstant: 1 << 1,
  blendSupportAllEquations: 1 << 2,
  color: 1 << 3,
  spirv: 1 << 4,
  metal: 1 << 5,
  gl: 1 << 6,
  wgsl: 1 << 7,
} as const;

/** Bits of Modifiers.flags */
export const ModifierFlag = {
  const: 1 << 0,
  in: 1 << 1,
  out: 1 << 2,
  uniform: 1 << 3,
  flat: 1 << 4,
  noPerspective: 1 << 5,
  hasSideEffects: 1 << 6,
  inline: 1 << 7,
  noInline: 1 << 8,
  highp: 1 << 9,
  mediump: 1 << 10,
  lowp: 1 << 11,
  es3: 1 << 12,
  buffer: 1 << 13,
  readOnly: 1 << 14,
  writeOnly: 1 << 15,
} as const;

/** Layout qualifiers. Integer fields use -1 for "not specified". */
export interface Layout {
  readonly flags: number;
  readonly location: number;
  readonly offset: number;
  readonly binding: number;
  readonly index: number;
  readonly set: number;
  readonly builtin: number;
  readonly inputAttachmentIndex: number;
}

export interface Modifiers {
  readonly layout: Layout;
  readonly flags: number;
}

export const DEFAULT_LAYOUT: Layout = Object.freeze({
  flags: 0,
  location: -1,
  offset: -1,
  binding: -1,
  index: -1,
  set: -1,
  builtin: -1,
  inputAttachmentIndex: -1,
});

export const DEFAULT_MODIFIERS: Modifiers = Object.freeze({ layout: DEFAULT_LAYOUT, flags: 0 });

/** Layout carrying only a builtin id */
export function builtinLayout(builtin: number): Layout {
  return { ...DEFAULT_LAYOUT, builtin };
}

const layoutFlagNames: [number, string][] = [
  [LayoutFlag.originUpperLeft, 'origin_upper_left'],
  [LayoutFlag.pushConstant, 'push_constant'],
  [LayoutFlag.blendSupportAllEquations, 'blend_support_all_equations'],
  [LayoutFlag.color, 'color'],
  [LayoutFlag.spirv, 'spirv'],
  [LayoutFlag.metal, 'metal'],
  [LayoutFlag.gl, 'gl'],
  [LayoutFlag.wgsl, 'wgsl'],
];

const modifierFlagNames: [number, string][] = [
  [ModifierFlag.es3, '$es3'],
  [ModifierFlag.hasSideEffects, 'sk_has_side_effects'],
  [ModifierFlag.noInline, 'noinline'],
  [ModifierFlag.inline, 'inline'],
  [ModifierFlag.uniform, 'uniform'],
  [ModifierFlag.flat, 'flat'],
  [ModifierFlag.noPerspective, 'noperspective'],
  [ModifierFlag.const, 'const'],
  [ModifierFlag.buffer, 'buffer'],
  [ModifierFlag.readOnly, 'readonly'],
  [ModifierFlag.writeOnly, 'writeonly'],
  [ModifierFlag.highp, 'highp'],
  [ModifierFlag.mediump, 'mediump'],
  [ModifierFlag.lowp, 'lowp'],
];

/** Render a layout as `layout (...) `, or the empty string when nothing is set */
export function describeLayout(layout: Layout): string {
  const parts: string[] = [];
  const ints: [number, string][] = [
    [layout.location, 'location'],
    [layout.offset, 'offset'],
    [layout.binding, 'binding'],
    [layout.index, 'index'],
    [layout.set, 'set'],
    [layout.builtin, 'builtin'],
    [layout.inputAttachmentIndex, 'input_attachment_index'],
  ];
  for (const [value, name] of ints) {
    if (value >= 0) parts.push(name + ' = ' + value);
  }
  for (const [bit, name] of layoutFlagNames) {
    if ((layout.flags & bit) !== 0) parts.push(name);
  }
  return parts.length === 0 ? '' : 'layout (' + parts.join(', ') + ') ';
}

/** Render modifiers the way they appear in front of a declaration, with a trailing space */
export function describeModifiers(modifiers: Modifiers): string {
  let result = describeLayout(modifiers.layout);
  for (const [bit, name] of modifierFlagNames) {
    if ((modifiers.flags & bit) !== 0) result += name + ' ';
  }
  const inOut = ModifierFlag.in | ModifierFlag.out;
  if ((modifiers.flags & inOut) === inOut) {
    result += 'inout ';
  } else if ((modifiers.flags & ModifierFlag.in) !== 0) {
    result += 'in ';
  } else if ((modifiers.flags & ModifierFlag.out) !== 0) {
    result += 'out ';
  }
  return result;
}
