import { z } from 'zod';

export const ChangePhoneCommandSchema = z
  .array(z.string())
  .min(3)
  .transform(([name, oldPhone, newPhone]) => ({ name, oldPhone, newPhone }));

export type ChangePhoneCommand = z.infer<typeof ChangePhoneCommandSchema>;

export function changePhoneCommand(args: readonly string[]): ChangePhoneCommand {
  return ChangePhoneCommandSchema.parse(args);
}
