import { BorrowTag } from "./Types";

export class TagAllocator {
    private counter: number = 0;

    public next(): BorrowTag {
        this.counter++;
        return this.counter;
    }

    // The tag the next call to next() will hand out.
    public peek(): BorrowTag {
        return this.counter + 1;
    }
}
