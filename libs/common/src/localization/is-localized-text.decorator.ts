import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { isLocalizedText } from './localized-text';

export function IsLocalizedText(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isLocalizedText',
      validator: {
        validate: (value: unknown) => isLocalizedText(value),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must map language codes to non-empty text`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
