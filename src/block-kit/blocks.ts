import { BlockKitError, checkStringLength, validateList } from './block-kit.errors';
import { ElementType, InteractiveElement, validateElement } from './elements';
import { BoundedText, checkTextField, DEFAULT_TEXT_MAX_LENGTH, TextType } from './text';

export const BlockType = {
  Actions: 'actions',
  Input: 'input',
  Divider: 'divider',
  Header: 'header',
  Context: 'context',
  Section: 'section',
} as const;

export type BlockType = (typeof BlockType)[keyof typeof BlockType];

export const BLOCK_ID_MAX_LENGTH = 255;
export const ACTIONS_MAX_ELEMENTS = 25;
export const CONTEXT_MAX_ELEMENTS = 10;
export const SECTION_MAX_FIELDS = 10;
export const SECTION_FIELD_MAX_LENGTH = 2000;
export const INPUT_LABEL_MAX_LENGTH = 2000;
export const HEADER_TEXT_MAX_LENGTH = 150;

interface BlockBase {
  /** Unique within a document; echoed back in interaction payloads */
  readonly blockId?: string;
}

export interface ActionsBlock extends BlockBase {
  readonly type: typeof BlockType.Actions;
  readonly elements: readonly InteractiveElement[];
}

export interface InputBlock extends BlockBase {
  readonly type: typeof BlockType.Input;
  readonly label: BoundedText;
  readonly element: InteractiveElement;
  readonly hint?: BoundedText;
  readonly optional?: boolean;
  readonly dispatchAction?: boolean;
}

export interface DividerBlock extends BlockBase {
  readonly type: typeof BlockType.Divider;
}

export interface ContextBlock extends BlockBase {
  readonly type: typeof BlockType.Context;
  readonly elements: readonly BoundedText[];
}

export interface HeaderBlock extends BlockBase {
  readonly type: typeof BlockType.Header;
  readonly text: BoundedText;
}

export interface SectionBlock extends BlockBase {
  readonly type: typeof BlockType.Section;
  readonly text?: BoundedText;
  readonly fields?: readonly BoundedText[];
  readonly accessory?: InteractiveElement;
}

export type Block =
  | ActionsBlock
  | InputBlock
  | DividerBlock
  | ContextBlock
  | HeaderBlock
  | SectionBlock;

type Props<T extends { type: unknown }> = Omit<T, 'type'>;

/** Element kinds each container accepts. */
const ACTIONS_ELEMENTS: readonly ElementType[] = [
  ElementType.StaticSelect,
  ElementType.MultiStaticSelect,
  ElementType.Checkboxes,
  ElementType.RadioButtons,
  ElementType.Button,
];
const INPUT_ELEMENTS: readonly ElementType[] = [
  ElementType.StaticSelect,
  ElementType.MultiStaticSelect,
  ElementType.Checkboxes,
  ElementType.RadioButtons,
  ElementType.PlainTextInput,
];
const SECTION_ACCESSORIES: readonly ElementType[] = ACTIONS_ELEMENTS;

function checkBlockId(blockId: string | undefined): void {
  if (blockId !== undefined) {
    checkStringLength('blockId', blockId, BLOCK_ID_MAX_LENGTH);
  }
}

/**
 * Check the element kind against what the container accepts, then re-run its builder.
 */
function checkElement(
  field: string,
  element: InteractiveElement,
  allowed: readonly ElementType[],
): InteractiveElement {
  if (!allowed.includes(element.type)) {
    throw new BlockKitError('KindMismatch', field, `${element.type} is not allowed here`);
  }
  return validateElement(element, field);
}

export function actionsBlock(props: Props<ActionsBlock>): ActionsBlock {
  checkBlockId(props.blockId);
  const elements = validateList(
    'actions.elements',
    props.elements,
    1,
    ACTIONS_MAX_ELEMENTS,
    (element, field) => checkElement(field, element, ACTIONS_ELEMENTS),
  );
  return Object.freeze<ActionsBlock>({ type: BlockType.Actions, blockId: props.blockId, elements });
}

export function inputBlock(props: Props<InputBlock>): InputBlock {
  checkBlockId(props.blockId);
  const label = checkTextField('input.label', props.label, INPUT_LABEL_MAX_LENGTH, TextType.Plain);
  const element = checkElement('input.element', props.element, INPUT_ELEMENTS);
  const hint =
    props.hint && checkTextField('input.hint', props.hint, INPUT_LABEL_MAX_LENGTH, TextType.Plain);

  return Object.freeze<InputBlock>({
    type: BlockType.Input,
    blockId: props.blockId,
    label,
    element,
    hint,
    optional: props.optional,
    dispatchAction: props.dispatchAction,
  });
}

export function dividerBlock(props: Props<DividerBlock> = {}): DividerBlock {
  checkBlockId(props.blockId);
  return Object.freeze<DividerBlock>({ type: BlockType.Divider, blockId: props.blockId });
}

export function contextBlock(props: Props<ContextBlock>): ContextBlock {
  checkBlockId(props.blockId);
  const elements = validateList(
    'context.elements',
    props.elements,
    1,
    CONTEXT_MAX_ELEMENTS,
    (text, field) => checkTextField(field, text, DEFAULT_TEXT_MAX_LENGTH),
  );
  return Object.freeze<ContextBlock>({ type: BlockType.Context, blockId: props.blockId, elements });
}

export function headerBlock(props: Props<HeaderBlock>): HeaderBlock {
  checkBlockId(props.blockId);
  const text = checkTextField('header.text', props.text, HEADER_TEXT_MAX_LENGTH, TextType.Plain);
  return Object.freeze<HeaderBlock>({ type: BlockType.Header, blockId: props.blockId, text });
}

export function sectionBlock(props: Props<SectionBlock>): SectionBlock {
  checkBlockId(props.blockId);

  if (props.text === undefined && props.fields === undefined) {
    throw new BlockKitError('MissingRequiredField', 'section', 'text or fields must be set');
  }
  const text = props.text && checkTextField('section.text', props.text, DEFAULT_TEXT_MAX_LENGTH);
  const fields =
    props.fields &&
    validateList('section.fields', props.fields, 1, SECTION_MAX_FIELDS, (field, path) =>
      checkTextField(path, field, SECTION_FIELD_MAX_LENGTH),
    );
  const accessory =
    props.accessory && checkElement('section.accessory', props.accessory, SECTION_ACCESSORIES);

  return Object.freeze<SectionBlock>({
    type: BlockType.Section,
    blockId: props.blockId,
    text,
    fields,
    accessory,
  });
}

/**
 * Re-run the builder matching the block's type and return its validated copy.
 */
export function validateBlock(block: Block): Block {
  switch (block.type) {
    case BlockType.Actions:
      return actionsBlock(block);
    case BlockType.Input:
      return inputBlock(block);
    case BlockType.Divider:
      return dividerBlock(block);
    case BlockType.Context:
      return contextBlock(block);
    case BlockType.Header:
      return headerBlock(block);
    case BlockType.Section:
      return sectionBlock(block);
    default: {
      const unhandled: never = block;
      throw new BlockKitError('KindMismatch', 'block', `unknown block ${JSON.stringify(unhandled)}`);
    }
  }
}
