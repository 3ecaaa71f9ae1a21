export type BindingInfo =
    | { kind: "allocation"; allocation: string; mutable: boolean } // the variable itself
    | { kind: "pointer"; allocation: string }
    | { kind: "integer"; allocation: string }; // a pointer cast to usize

/**
 * Static view of the names a trace has bound so far. Later bindings shadow
 * earlier ones of the same name.
 */
export class BindingEnvironment {
    private bindings: Map<string, BindingInfo> = new Map();
    // allocation name -> declared `mut`
    private declared: Map<string, boolean> = new Map();

    /**
     * Records a declaration. Returns false when the allocation already exists.
     */
    declare(name: string, mutable: boolean): boolean {
        if (this.declared.has(name)) {
            return false;
        }
        this.declared.set(name, mutable);
        this.bindings.set(name, { kind: "allocation", allocation: name, mutable });
        return true;
    }

    define(name: string, info: BindingInfo): void {
        this.bindings.set(name, info);
    }

    lookup(name: string): BindingInfo | null {
        return this.bindings.get(name) ?? null;
    }

    isMutable(allocation: string): boolean | null {
        return this.declared.get(allocation) ?? null;
    }
}
