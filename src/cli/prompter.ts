import { confirm, input, password, select } from "@inquirer/prompts"
import {
    ConfirmPromptArgs, InputPromptArgs, OperatorPrompter, PasswordPromptArgs, SelectPromptArgs,
} from "../core/ports"

/**
 * Terminal prompts for an interactive operator
 */
export class InquirerOperatorPrompter implements OperatorPrompter {

    async input(args: InputPromptArgs): Promise<string> {
        return input({
            message: args.message,
            default: args.default,
            validate: args.validate,
        })
    }

    async password(args: PasswordPromptArgs): Promise<string> {
        return password({
            message: args.message,
            mask: "*",
            validate: args.validate,
        })
    }

    async confirm(args: ConfirmPromptArgs): Promise<boolean> {
        return confirm({
            message: args.message,
            default: args.default,
        })
    }

    async select<T extends string>(args: SelectPromptArgs<T>): Promise<T> {
        return select<T>({
            message: args.message,
            choices: args.choices,
            default: args.default,
            loop: false,
        })
    }
}
