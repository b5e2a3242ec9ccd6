import { BlockKitError, checkStringLength, validateList } from './block-kit.errors';
import {
  createOption,
  createOptionGroup,
  isOptionGroup,
  Option,
  OptionGroup,
  sortedValues,
} from './option';
import { BoundedText, checkTextField, TextType } from './text';

/**
 * Interactive element kinds, keyed by symbolic name with their wire token as value.
 */
export const ElementType = {
  StaticSelect: 'static_select',
  MultiStaticSelect: 'multi_static_select',
  Checkboxes: 'checkboxes',
  RadioButtons: 'radio_buttons',
  Button: 'button',
  PlainTextInput: 'plain_text_input',
} as const;

export type ElementType = (typeof ElementType)[keyof typeof ElementType];

export const ButtonStyle = {
  Primary: 'primary',
  Danger: 'danger',
} as const;

export type ButtonStyle = (typeof ButtonStyle)[keyof typeof ButtonStyle];

export const DispatchTrigger = {
  OnEnterPressed: 'on_enter_pressed',
  OnCharacterEntered: 'on_character_entered',
} as const;

export type DispatchTrigger = (typeof DispatchTrigger)[keyof typeof DispatchTrigger];

export const ACTION_ID_MAX_LENGTH = 255;
export const PLACEHOLDER_MAX_LENGTH = 150;
export const SELECT_MAX_OPTIONS = 100;
export const SELECTOR_MAX_OPTIONS = 10;
export const BUTTON_TEXT_MAX_LENGTH = 75;
export const BUTTON_VALUE_MAX_LENGTH = 2000;
export const BUTTON_URL_MAX_LENGTH = 3000;
export const TEXT_INPUT_MAX_LENGTH = 3000;

interface ElementBase {
  /** Identifies the source of an interaction payload; unique within its block */
  readonly actionId: string;
}

export interface StaticSelectElement extends ElementBase {
  readonly type: typeof ElementType.StaticSelect;
  readonly placeholder: BoundedText;
  readonly options?: readonly Option[];
  readonly optionGroups?: readonly OptionGroup[];
  readonly initialOption?: Option | OptionGroup;
}

export interface MultiStaticSelectElement extends ElementBase {
  readonly type: typeof ElementType.MultiStaticSelect;
  readonly placeholder: BoundedText;
  readonly options?: readonly Option[];
  readonly optionGroups?: readonly OptionGroup[];
  readonly initialOption?: Option | OptionGroup;
  readonly maxSelectedItems?: number;
}

export interface SelectorElement extends ElementBase {
  readonly type: typeof ElementType.Checkboxes | typeof ElementType.RadioButtons;
  readonly options: readonly Option[];
  readonly initialOptions?: readonly Option[];
}

export interface ButtonElement extends ElementBase {
  readonly type: typeof ElementType.Button;
  readonly text: BoundedText;
  readonly url?: string;
  readonly value?: string;
  readonly style?: ButtonStyle;
  readonly accessibilityLabel?: string;
}

export interface DispatchActionConfig {
  readonly triggerActionsOn: readonly DispatchTrigger[];
}

export interface PlainTextInputElement extends ElementBase {
  readonly type: typeof ElementType.PlainTextInput;
  readonly placeholder?: BoundedText;
  readonly initialValue?: string;
  readonly multiline?: boolean;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly dispatchActionConfig?: DispatchActionConfig;
}

export type InteractiveElement =
  | StaticSelectElement
  | MultiStaticSelectElement
  | SelectorElement
  | ButtonElement
  | PlainTextInputElement;

type Props<T extends { type: unknown }> = Omit<T, 'type'>;

function checkActionId(field: string, actionId: string): void {
  if (!actionId) {
    throw new BlockKitError('MissingRequiredField', `${field}.actionId`, 'actionId must not be empty');
  }
  checkStringLength(`${field}.actionId`, actionId, ACTION_ID_MAX_LENGTH);
}

type SelectMenuProps = Props<StaticSelectElement> | Props<MultiStaticSelectElement>;

/** Validated copies of the parts shared by single and multi static selects */
interface SelectMenuParts {
  readonly placeholder: BoundedText;
  readonly options?: readonly Option[];
  readonly optionGroups?: readonly OptionGroup[];
  readonly initialOption?: Option | OptionGroup;
}

function groupKey(group: OptionGroup): string {
  return sortedValues(group.options).join('\u0000');
}

/**
 * Shared checks for single and multi static selects: placeholder, the options/optionGroups
 * exclusion, list sizes and the initial selection reference.
 */
function checkSelectMenu(field: string, props: SelectMenuProps): SelectMenuParts {
  checkActionId(field, props.actionId);
  const placeholder = checkTextField(
    `${field}.placeholder`,
    props.placeholder,
    PLACEHOLDER_MAX_LENGTH,
    TextType.Plain,
  );

  if ((props.options === undefined) === (props.optionGroups === undefined)) {
    throw new BlockKitError(
      'MutualExclusionViolation',
      field,
      'exactly one of options or optionGroups must be set',
    );
  }

  const options =
    props.options &&
    validateList(`${field}.options`, props.options, 1, SELECT_MAX_OPTIONS, createOption);
  const optionGroups =
    props.optionGroups &&
    validateList(
      `${field}.optionGroups`,
      props.optionGroups,
      1,
      SELECT_MAX_OPTIONS,
      createOptionGroup,
    );

  if (props.initialOption === undefined) {
    return { placeholder, options, optionGroups };
  }

  const initialField = `${field}.initialOption`;

  if (isOptionGroup(props.initialOption)) {
    const initialOption = createOptionGroup(props.initialOption, initialField);
    const wanted = groupKey(initialOption);
    if (!(optionGroups ?? []).some((group) => groupKey(group) === wanted)) {
      throw new BlockKitError(
        'ReferenceIntegrityViolation',
        initialField,
        'initial option group does not match any declared option group',
      );
    }
    return { placeholder, options, optionGroups, initialOption };
  }

  const initialOption = createOption(props.initialOption, initialField);
  const declared = options ?? (optionGroups ?? []).flatMap((group) => group.options);
  if (!declared.some((option) => option.value === initialOption.value)) {
    throw new BlockKitError(
      'ReferenceIntegrityViolation',
      initialField,
      `value "${initialOption.value}" is not one of the declared options`,
    );
  }
  return { placeholder, options, optionGroups, initialOption };
}

export function staticSelect(props: Props<StaticSelectElement>, field = 'element'): StaticSelectElement {
  const parts = checkSelectMenu(field, props);
  return Object.freeze<StaticSelectElement>({
    type: ElementType.StaticSelect,
    actionId: props.actionId,
    ...parts,
  });
}

export function multiStaticSelect(
  props: Props<MultiStaticSelectElement>,
  field = 'element',
): MultiStaticSelectElement {
  const parts = checkSelectMenu(field, props);
  const { maxSelectedItems } = props;
  if (
    maxSelectedItems !== undefined &&
    (!Number.isInteger(maxSelectedItems) || maxSelectedItems < 1)
  ) {
    throw new BlockKitError(
      'CardinalityViolation',
      `${field}.maxSelectedItems`,
      `maxSelectedItems must be an integer of at least 1, got ${maxSelectedItems}`,
    );
  }
  return Object.freeze<MultiStaticSelectElement>({
    type: ElementType.MultiStaticSelect,
    actionId: props.actionId,
    ...parts,
    maxSelectedItems,
  });
}

function selector(
  type: SelectorElement['type'],
  props: Props<SelectorElement>,
  field: string,
): SelectorElement {
  checkActionId(field, props.actionId);
  const options = validateList(
    `${field}.options`,
    props.options,
    1,
    SELECTOR_MAX_OPTIONS,
    createOption,
  );

  let initialOptions: readonly Option[] | undefined;
  if (props.initialOptions) {
    const maxInitial = type === ElementType.RadioButtons ? 1 : SELECTOR_MAX_OPTIONS;
    initialOptions = validateList(
      `${field}.initialOptions`,
      props.initialOptions,
      0,
      maxInitial,
      createOption,
    );

    const values = new Set(options.map((o) => o.value));
    initialOptions.forEach((option, i) => {
      if (!values.has(option.value)) {
        throw new BlockKitError(
          'ReferenceIntegrityViolation',
          `${field}.initialOptions[${i}]`,
          `value "${option.value}" is not one of the declared options`,
        );
      }
    });
  }

  return Object.freeze<SelectorElement>({ type, actionId: props.actionId, options, initialOptions });
}

export function checkboxes(props: Props<SelectorElement>, field = 'element'): SelectorElement {
  return selector(ElementType.Checkboxes, props, field);
}

export function radioButtons(props: Props<SelectorElement>, field = 'element'): SelectorElement {
  return selector(ElementType.RadioButtons, props, field);
}

const BUTTON_STYLES: readonly string[] = Object.values(ButtonStyle);
const DISPATCH_TRIGGERS: readonly string[] = Object.values(DispatchTrigger);

export function button(props: Props<ButtonElement>, field = 'element'): ButtonElement {
  checkActionId(field, props.actionId);
  const text = checkTextField(`${field}.text`, props.text, BUTTON_TEXT_MAX_LENGTH, TextType.Plain);
  if (props.url !== undefined) {
    checkStringLength(`${field}.url`, props.url, BUTTON_URL_MAX_LENGTH);
  }
  if (props.value !== undefined) {
    checkStringLength(`${field}.value`, props.value, BUTTON_VALUE_MAX_LENGTH);
  }
  if (props.style !== undefined && !BUTTON_STYLES.includes(props.style)) {
    throw new BlockKitError('KindMismatch', `${field}.style`, `unknown button style ${props.style}`);
  }
  if (props.accessibilityLabel !== undefined) {
    checkStringLength(`${field}.accessibilityLabel`, props.accessibilityLabel, BUTTON_TEXT_MAX_LENGTH);
  }
  return Object.freeze<ButtonElement>({
    type: ElementType.Button,
    actionId: props.actionId,
    text,
    url: props.url,
    value: props.value,
    style: props.style,
    accessibilityLabel: props.accessibilityLabel,
  });
}

export function dispatchActionConfig(
  triggerActionsOn: readonly DispatchTrigger[],
  field = 'dispatchActionConfig',
): DispatchActionConfig {
  const triggers = validateList(
    `${field}.triggerActionsOn`,
    triggerActionsOn,
    1,
    2,
    (trigger, path) => {
      if (!DISPATCH_TRIGGERS.includes(trigger)) {
        throw new BlockKitError('KindMismatch', path, `unknown trigger ${trigger}`);
      }
      return trigger;
    },
  );
  if (new Set(triggers).size !== triggers.length) {
    throw new BlockKitError(
      'CardinalityViolation',
      `${field}.triggerActionsOn`,
      'triggers must not repeat',
    );
  }
  return Object.freeze({ triggerActionsOn: triggers });
}

function checkLengthBound(field: string, value: number, min: number, max?: number): void {
  if (!Number.isInteger(value) || value < min || (max !== undefined && value > max)) {
    const range = max === undefined ? `at least ${min}` : `between ${min} and ${max}`;
    throw new BlockKitError('LengthExceeded', field, `must be an integer ${range}, got ${value}`);
  }
}

export function plainTextInput(
  props: Props<PlainTextInputElement>,
  field = 'element',
): PlainTextInputElement {
  checkActionId(field, props.actionId);
  const placeholder =
    props.placeholder &&
    checkTextField(`${field}.placeholder`, props.placeholder, PLACEHOLDER_MAX_LENGTH, TextType.Plain);

  const { minLength, maxLength, initialValue } = props;
  if (minLength !== undefined) {
    checkLengthBound(`${field}.minLength`, minLength, 0, TEXT_INPUT_MAX_LENGTH - 1);
  }
  if (maxLength !== undefined) {
    checkLengthBound(`${field}.maxLength`, maxLength, 1);
  }
  if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
    throw new BlockKitError(
      'LengthExceeded',
      `${field}.minLength`,
      `minLength ${minLength} exceeds maxLength ${maxLength}`,
    );
  }
  if (initialValue !== undefined) {
    checkStringLength(`${field}.initialValue`, initialValue, maxLength ?? TEXT_INPUT_MAX_LENGTH);
  }

  return Object.freeze<PlainTextInputElement>({
    type: ElementType.PlainTextInput,
    actionId: props.actionId,
    placeholder,
    initialValue,
    multiline: props.multiline,
    minLength,
    maxLength,
    dispatchActionConfig:
      props.dispatchActionConfig &&
      dispatchActionConfig(
        props.dispatchActionConfig.triggerActionsOn,
        `${field}.dispatchActionConfig`,
      ),
  });
}

/**
 * Re-run the builder matching the element's type and return its validated copy.
 * Containers call this so hand-assembled elements are checked like built ones.
 */
export function validateElement(element: InteractiveElement, field = 'element'): InteractiveElement {
  switch (element.type) {
    case ElementType.StaticSelect:
      return staticSelect(element, field);
    case ElementType.MultiStaticSelect:
      return multiStaticSelect(element, field);
    case ElementType.Checkboxes:
      return checkboxes(element, field);
    case ElementType.RadioButtons:
      return radioButtons(element, field);
    case ElementType.Button:
      return button(element, field);
    case ElementType.PlainTextInput:
      return plainTextInput(element, field);
    default: {
      const unhandled: never = element;
      throw new BlockKitError('KindMismatch', field, `unknown element ${JSON.stringify(unhandled)}`);
    }
  }
}
