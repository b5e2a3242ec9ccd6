import { BlockKitError, checkStringLength, validateList } from './block-kit.errors';
import { BoundedText, checkTextField, TextType } from './text';

export const OPTION_TEXT_MAX_LENGTH = 75;
export const OPTION_VALUE_MAX_LENGTH = 75;
export const OPTION_URL_MAX_LENGTH = 3000;
export const OPTION_GROUP_MAX_OPTIONS = 100;

/**
 * A selectable choice, identified by its value.
 */
export interface Option {
  readonly text: BoundedText;
  /** Returned to the app when this option is chosen */
  readonly value: string;
  /** Line shown below the option text */
  readonly description?: BoundedText;
  /** Only honoured by overflow menus */
  readonly url?: string;
}

export interface OptionGroup {
  readonly label: BoundedText;
  readonly options: readonly Option[];
}

export function createOption(props: Option, field = 'option'): Option {
  const text = checkTextField(`${field}.text`, props.text, OPTION_TEXT_MAX_LENGTH);

  if (!props.value) {
    throw new BlockKitError('MissingRequiredField', `${field}.value`, 'value must not be empty');
  }
  checkStringLength(`${field}.value`, props.value, OPTION_VALUE_MAX_LENGTH);

  const description =
    props.description &&
    checkTextField(`${field}.description`, props.description, OPTION_TEXT_MAX_LENGTH, TextType.Plain);
  if (props.url !== undefined) {
    checkStringLength(`${field}.url`, props.url, OPTION_URL_MAX_LENGTH);
  }

  return Object.freeze<Option>({ text, value: props.value, description, url: props.url });
}

export function createOptionGroup(props: OptionGroup, field = 'optionGroup'): OptionGroup {
  const label = checkTextField(`${field}.label`, props.label, OPTION_TEXT_MAX_LENGTH, TextType.Plain);
  const options = validateList(
    `${field}.options`,
    props.options,
    1,
    OPTION_GROUP_MAX_OPTIONS,
    createOption,
  );

  return Object.freeze<OptionGroup>({ label, options });
}

export function isOptionGroup(selection: Option | OptionGroup): selection is OptionGroup {
  return 'options' in selection;
}

/** Values of a group's options, sorted, for comparing groups by content. */
export function sortedValues(options: readonly Option[]): string[] {
  return options.map((o) => o.value).sort();
}
