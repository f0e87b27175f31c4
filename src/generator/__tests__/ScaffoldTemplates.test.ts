import { renderScaffold, ScaffoldVariant, variantForIndex } from '../ScaffoldTemplates';

describe('ScaffoldTemplates', () => {
    describe('variantForIndex', () => {
        it('should cycle through the variants and reuse the last one', () => {
            expect([0, 1, 2, 3, 7].map(variantForIndex)).toEqual([
                ScaffoldVariant.INSTANCE_EQUALITY,
                ScaffoldVariant.DOES_NOT_THROW,
                ScaffoldVariant.TYPE_CHECK,
                ScaffoldVariant.TYPE_CHECK,
                ScaffoldVariant.TYPE_CHECK,
            ]);
        });
    });

    describe('renderScaffold', () => {
        const target = { testMethodName: 'testRender_Case2', className: 'Widget', methodName: 'render' };

        it('should wrap the invocation in assertDoesNotThrow', () => {
            expect(renderScaffold(ScaffoldVariant.DOES_NOT_THROW, target)).toBe(
                [
                    '    @Test',
                    '    public void testRender_Case2() {',
                    '        Widget instance = new Widget();',
                    '',
                    '        assertDoesNotThrow(() -> {',
                    '            instance.render();',
                    '        });',
                    '',
                    '        assertNotNull(instance);',
                    '    }',
                ].join('\n')
            );
        });

        it('should assert the instance type', () => {
            expect(renderScaffold(ScaffoldVariant.TYPE_CHECK, { ...target, testMethodName: 'testRender_Case3' })).toBe(
                [
                    '    @Test',
                    '    public void testRender_Case3() {',
                    '        Widget instance = new Widget();',
                    '        instance.render();',
                    '',
                    '        Object result = instance;',
                    '        assertNotNull(result);',
                    '        assertTrue(result instanceof Widget);',
                    '    }',
                ].join('\n')
            );
        });

        it('should construct only when there is no method to call', () => {
            const classTarget = { testMethodName: 'testWidget_Case1', className: 'Widget' };

            expect(renderScaffold(ScaffoldVariant.INSTANCE_EQUALITY, classTarget)).toBe(
                [
                    '    @Test',
                    '    public void testWidget_Case1() {',
                    '        Widget instance = new Widget();',
                    '        assertNotNull(instance);',
                    '',
                    '        assertEquals(instance, instance);',
                    '    }',
                ].join('\n')
            );
            expect(renderScaffold(ScaffoldVariant.DOES_NOT_THROW, classTarget)).toContain(
                '        assertDoesNotThrow(() -> new Widget());'
            );
        });
    });
});
