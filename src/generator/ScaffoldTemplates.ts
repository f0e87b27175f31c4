/**
 * JUnit 5 body shapes for scaffolded test cases
 */
export enum ScaffoldVariant {
    /** Construct, invoke, then assert the instance equals itself */
    INSTANCE_EQUALITY = 'INSTANCE_EQUALITY',
    /** Construct, assert the invocation does not throw */
    DOES_NOT_THROW = 'DOES_NOT_THROW',
    /** Construct, invoke, then assert the result keeps the target type */
    TYPE_CHECK = 'TYPE_CHECK',
}

/**
 * Variant used for each case index; indices past the end reuse the last entry
 */
export const VARIANT_ORDER: readonly ScaffoldVariant[] = [
    ScaffoldVariant.INSTANCE_EQUALITY,
    ScaffoldVariant.DOES_NOT_THROW,
    ScaffoldVariant.TYPE_CHECK,
];

export interface ScaffoldTarget {
    testMethodName: string;
    /** Simple name of the class under test */
    className: string;
    /** Bare method name; undefined for class-level targets */
    methodName?: string;
}

export function variantForIndex(caseIndex: number): ScaffoldVariant {
    return VARIANT_ORDER[Math.min(Math.max(caseIndex, 0), VARIANT_ORDER.length - 1)];
}

/**
 * Render one `@Test` method, indented for placement inside a test class
 */
export function renderScaffold(variant: ScaffoldVariant, target: ScaffoldTarget): string {
    const statements = variantStatements(variant, target);
    const body = statements.map(line => (line ? `        ${line}` : ''));

    return [
        '    @Test',
        `    public void ${target.testMethodName}() {`,
        ...body,
        '    }',
    ].join('\n');
}

function variantStatements(variant: ScaffoldVariant, target: ScaffoldTarget): string[] {
    const { className, methodName } = target;
    const construct = `${className} instance = new ${className}();`;
    const invoke = methodName ? [`instance.${methodName}();`] : [];

    switch (variant) {
        case ScaffoldVariant.INSTANCE_EQUALITY:
            return [
                construct,
                'assertNotNull(instance);',
                '',
                ...(methodName ? [...invoke, ''] : []),
                'assertEquals(instance, instance);',
            ];
        case ScaffoldVariant.DOES_NOT_THROW:
            if (!methodName) {
                return [
                    `assertDoesNotThrow(() -> new ${className}());`,
                ];
            }
            return [
                construct,
                '',
                'assertDoesNotThrow(() -> {',
                `    instance.${methodName}();`,
                '});',
                '',
                'assertNotNull(instance);',
            ];
        case ScaffoldVariant.TYPE_CHECK:
            return [
                construct,
                ...invoke,
                '',
                'Object result = instance;',
                'assertNotNull(result);',
                `assertTrue(result instanceof ${className});`,
            ];
    }
}
