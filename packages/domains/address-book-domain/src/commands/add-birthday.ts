import { z } from 'zod';

export const AddBirthdayCommandSchema = z
  .array(z.string())
  .min(2)
  .transform(([name, birthday]) => ({ name, birthday }));

export type AddBirthdayCommand = z.infer<typeof AddBirthdayCommandSchema>;

export function addBirthdayCommand(args: readonly string[]): AddBirthdayCommand {
  return AddBirthdayCommandSchema.parse(args);
}
