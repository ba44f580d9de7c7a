import * as clack from '@clack/prompts'
import { colors } from './ui.js'

export interface Spinner {
    start(message?: string): void
    stop(message?: string): void
}

export interface SelectOption<T extends string> {
    value: T
    label: string
    hint?: string
}

export interface TextOptions {
    placeholder?: string
    defaultValue?: string
    validate?: (value: string) => string | undefined
}

/**
 * Everything Holocron prints or asks goes through this interface. Prompt
 * methods resolve to null when the user cancels.
 */
export interface Terminal {
    readonly interactive: boolean
    print(text: string): void
    write(chunk: string): void
    spinner(): Spinner
    text(message: string, options?: TextOptions): Promise<string | null>
    select<T extends string>(message: string, options: SelectOption<T>[], initialValue?: T): Promise<T | null>
    confirm(message: string, initialValue?: boolean): Promise<boolean | null>
}

interface OutputStream {
    readonly isTTY?: boolean
    write(chunk: string): boolean
}

const FRAMES = ['◒', '◐', '◓', '◑']
const FRAME_MS = 80

/**
 * Progress line written straight to the output stream. Unlike the clack
 * spinner it never puts stdin into raw mode, so Ctrl+C still raises SIGINT
 * and interrupts the running assistant call.
 */
export class StatusLine implements Spinner {
    private timer: NodeJS.Timeout | undefined
    private frame = 0
    private message = ''

    constructor(private readonly out: OutputStream = process.stdout) {}

    start(message = ''): void {
        this.message = message
        if (!this.out.isTTY) {
            this.out.write(`${colors.dim(message)}\n`)
            return
        }
        this.render()
        this.timer = setInterval(() => this.render(), FRAME_MS)
        this.timer.unref()
    }

    stop(message?: string): void {
        if (this.timer) {
            clearInterval(this.timer)
            this.timer = undefined
            this.out.write('\r\x1b[K')
        }
        if (message) this.out.write(`${colors.dim(message)}\n`)
    }

    private render(): void {
        const glyph = FRAMES[this.frame % FRAMES.length] ?? ''
        this.frame += 1
        this.out.write(`\r\x1b[K${colors.brand(glyph)}  ${this.message}`)
    }
}

export class ClackTerminal implements Terminal {
    get interactive(): boolean {
        return Boolean(process.stdin.isTTY)
    }

    print(text: string): void {
        console.log(text)
    }

    write(chunk: string): void {
        process.stdout.write(chunk)
    }

    spinner(): Spinner {
        return new StatusLine()
    }

    async text(message: string, options: TextOptions = {}): Promise<string | null> {
        const result = await clack.text({
            message,
            placeholder: options.placeholder,
            defaultValue: options.defaultValue,
            validate: options.validate,
        })
        if (clack.isCancel(result)) return null
        return result
    }

    async select<T extends string>(
        message: string,
        options: SelectOption<T>[],
        initialValue?: T
    ): Promise<T | null> {
        const result = await clack.select<string>({
            message,
            options: options.map((o) => ({ value: o.value, label: o.label, hint: o.hint })),
            initialValue,
        })
        if (clack.isCancel(result)) return null
        return options.find((o) => o.value === result)?.value ?? null
    }

    async confirm(message: string, initialValue = true): Promise<boolean | null> {
        const result = await clack.confirm({ message, initialValue })
        if (clack.isCancel(result)) return null
        return result
    }
}
