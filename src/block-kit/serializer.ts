import { Block, BlockType, validateBlock } from './blocks';
import { ElementType, InteractiveElement, validateElement } from './elements';
import { isOptionGroup, Option, OptionGroup } from './option';
import { BoundedText } from './text';

export type SerializedValue = string | number | boolean | SerializedNode | SerializedValue[];

export interface SerializedNode {
  [key: string]: SerializedValue;
}

/**
 * Drop unset entries so optional fields never appear as keys.
 */
function compact(entries: Record<string, SerializedValue | undefined>): SerializedNode {
  const node: SerializedNode = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) {
      node[key] = value;
    }
  }
  return node;
}

function mapOptional<T>(
  value: T | undefined,
  serialize: (value: T) => SerializedValue,
): SerializedValue | undefined {
  return value === undefined ? undefined : serialize(value);
}

export function serializeText(text: BoundedText): SerializedNode {
  return compact({
    type: text.type,
    text: text.text,
    emoji: text.emoji,
    verbatim: text.verbatim,
  });
}

export function serializeOption(option: Option): SerializedNode {
  return compact({
    text: serializeText(option.text),
    value: option.value,
    description: mapOptional(option.description, serializeText),
    url: option.url,
  });
}

export function serializeOptionGroup(group: OptionGroup): SerializedNode {
  return {
    label: serializeText(group.label),
    options: group.options.map(serializeOption),
  };
}

function serializeSelection(selection: Option | OptionGroup): SerializedNode {
  return isOptionGroup(selection) ? serializeOptionGroup(selection) : serializeOption(selection);
}

function selectionOptions(selection: Option | OptionGroup): SerializedValue[] {
  return isOptionGroup(selection) ? selection.options.map(serializeOption) : [serializeOption(selection)];
}

function emitElement(element: InteractiveElement): SerializedNode {
  switch (element.type) {
    case ElementType.StaticSelect:
      return compact({
        type: element.type,
        action_id: element.actionId,
        placeholder: serializeText(element.placeholder),
        options: element.options?.map(serializeOption),
        option_groups: element.optionGroups?.map(serializeOptionGroup),
        initial_option: mapOptional(element.initialOption, serializeSelection),
      });

    case ElementType.MultiStaticSelect:
      return compact({
        type: element.type,
        action_id: element.actionId,
        placeholder: serializeText(element.placeholder),
        options: element.options?.map(serializeOption),
        option_groups: element.optionGroups?.map(serializeOptionGroup),
        initial_options: mapOptional(element.initialOption, selectionOptions),
        max_selected_items: element.maxSelectedItems,
      });

    case ElementType.Checkboxes:
      return compact({
        type: element.type,
        action_id: element.actionId,
        options: element.options.map(serializeOption),
        initial_options: element.initialOptions?.map(serializeOption),
      });

    case ElementType.RadioButtons:
      return compact({
        type: element.type,
        action_id: element.actionId,
        options: element.options.map(serializeOption),
        initial_option: mapOptional(element.initialOptions?.[0], serializeOption),
      });

    case ElementType.Button:
      return compact({
        type: element.type,
        action_id: element.actionId,
        text: serializeText(element.text),
        url: element.url,
        value: element.value,
        style: element.style,
        accessibility_label: element.accessibilityLabel,
      });

    case ElementType.PlainTextInput:
      return compact({
        type: element.type,
        action_id: element.actionId,
        placeholder: mapOptional(element.placeholder, serializeText),
        initial_value: element.initialValue,
        multiline: element.multiline,
        min_length: element.minLength,
        max_length: element.maxLength,
        dispatch_action_config: mapOptional(element.dispatchActionConfig, (config) => ({
          trigger_actions_on: [...config.triggerActionsOn],
        })),
      });

    default: {
      const unhandled: never = element;
      throw new Error(`Unknown element: ${JSON.stringify(unhandled)}`);
    }
  }
}

function emitBlock(block: Block): SerializedNode {
  switch (block.type) {
    case BlockType.Actions:
      return compact({
        type: block.type,
        block_id: block.blockId,
        elements: block.elements.map(emitElement),
      });

    case BlockType.Input:
      return compact({
        type: block.type,
        block_id: block.blockId,
        label: serializeText(block.label),
        element: emitElement(block.element),
        hint: mapOptional(block.hint, serializeText),
        optional: block.optional,
        dispatch_action: block.dispatchAction,
      });

    case BlockType.Divider:
      return compact({ type: block.type, block_id: block.blockId });

    case BlockType.Context:
      return compact({
        type: block.type,
        block_id: block.blockId,
        elements: block.elements.map(serializeText),
      });

    case BlockType.Header:
      return compact({
        type: block.type,
        block_id: block.blockId,
        text: serializeText(block.text),
      });

    case BlockType.Section:
      return compact({
        type: block.type,
        block_id: block.blockId,
        text: mapOptional(block.text, serializeText),
        fields: block.fields?.map(serializeText),
        accessory: mapOptional(block.accessory, emitElement),
      });

    default: {
      const unhandled: never = block;
      throw new Error(`Unknown block: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Validate an element, nested nodes included, and emit its wire form.
 */
export function serializeElement(element: InteractiveElement): SerializedNode {
  return emitElement(validateElement(element));
}

/**
 * Validate a block, nested nodes included, and emit its wire form.
 * Nothing reaches the output without passing its builder's checks.
 */
export function serializeBlock(block: Block): SerializedNode {
  return emitBlock(validateBlock(block));
}

export function serializeBlocks(blocks: readonly Block[]): SerializedNode[] {
  return blocks.map((block) => serializeBlock(block));
}
