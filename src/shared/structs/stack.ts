class StackNode<T> {
    readonly value: T;
    readonly next: StackNode<T> | undefined;

    constructor(value: T, next: StackNode<T> | undefined) {
        this.value = value;
        this.next = next;
    }
}

const SEPARATOR = " -> ";

/**
 * LIFO container backed by a singly-linked chain of nodes.
 * The head node is the top of the stack.
 */
export class Stack<T> {
    private head: StackNode<T> | undefined;
    private count: number;

    constructor() {
        this.head = undefined;
        this.count = 0;
    }

    push(value: T) {
        this.head = new StackNode(value, this.head);
        this.count += 1;
    }

    /** Removes the top element. Returns `undefined` when the stack is empty. */
    pop(): T | undefined {
        if (this.head === undefined) {
            if (this.count !== 0) {
                throw new Error(`Stack.head is undefined, but count is ${this.count}`);
            }
            return undefined;
        }

        const {value, next} = this.head;
        this.head = next;
        this.count -= 1;
        return value;
    }

    peek(): T | undefined {
        if (this.head === undefined) {
            return undefined;
        }
        const {value} = this.head;
        return value;
    }

    isEmpty(): boolean {
        return this.count === 0;
    }

    size(): number {
        return this.count;
    }

    /**
     * Copies the chain into a new stack. Values are shared, nodes are not,
     * so pushing or popping on one stack leaves the other untouched.
     */
    clone(): Stack<T> {
        const copy = new Stack<T>();
        const values = this.toJSON();
        for (let index = values.length - 1; index >= 0; index--) {
            copy.push(values[index]);
        }
        return copy;
    }

    /** Values from top to bottom. */
    toJSON(): T[] {
        const answer: T[] = [];
        let node = this.head;
        while (node !== undefined) {
            answer.push(node.value);
            node = node.next;
        }
        return answer;
    }

    /** Renders the values from top to bottom, e.g. `3 -> 2 -> 1`. */
    toString(): string {
        let answer = "";
        let node = this.head;
        while (node !== undefined) {
            if (node !== this.head) {
                answer += SEPARATOR;
            }
            answer += String(node.value);
            node = node.next;
        }
        return answer;
    }
}
