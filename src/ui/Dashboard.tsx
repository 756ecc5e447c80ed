import React, { useState, useEffect } from 'react';
import { Box, Text } from 'ink';
import type { DatasetResult, PipelineManager, LeagueState, LeagueRunStatus } from '../lib/pipeline-manager.js';
import { logStore, type LogEntry } from './log-store.js';

interface DashboardProps {
    pipelineManager: PipelineManager;
}

function statusColor(status: LeagueRunStatus): string {
    switch (status) {
        case 'fetching':
        case 'normalizing':
            return 'green';
        case 'done':
            return 'cyan';
        case 'skipped':
            return 'yellow';
        case 'failed':
            return 'red';
        default:
            return 'white';
    }
}

const StatusTable = ({ states }: { states: LeagueState[] }) => {
    return (
        <Box flexDirection="column" borderStyle="single" borderColor="blue" paddingX={1}>
            <Box>
                <Box width="20%"><Text bold color="cyan">Dataset</Text></Box>
                <Box width="20%"><Text bold color="cyan">League</Text></Box>
                <Box width="15%"><Text bold color="cyan">Status</Text></Box>
                <Box width="10%"><Text bold color="cyan">Rows</Text></Box>
                <Box width="35%"><Text bold color="cyan">Detail</Text></Box>
            </Box>
            <Box flexDirection="column">
                {states.map(state => (
                    <Box key={`${state.dataset}-${state.league}`}>
                        <Box width="20%"><Text>{state.dataset}</Text></Box>
                        <Box width="20%"><Text>{state.league}</Text></Box>
                        <Box width="15%">
                            <Text color={statusColor(state.status)}>{state.status.toUpperCase()}</Text>
                        </Box>
                        <Box width="10%"><Text>{state.rows}</Text></Box>
                        <Box width="35%"><Text wrap="truncate-end">{state.detail ?? '-'}</Text></Box>
                    </Box>
                ))}
            </Box>
        </Box>
    );
};

const CompletedDatasets = ({ results }: { results: DatasetResult[] }) => {
    if (results.length === 0) return null;

    return (
        <Box flexDirection="column" borderStyle="single" borderColor="green" paddingX={1}>
            <Text bold>Completed Datasets</Text>
            {results.map(result => (
                <Box key={result.name}>
                    <Text color={result.outputPath === null ? 'yellow' : 'cyan'}>{result.name}: </Text>
                    <Text>
                        {result.outputPath === null
                            ? 'no league succeeded, nothing written'
                            : `${result.table.rows.length} rows -> ${result.outputPath}`}
                    </Text>
                </Box>
            ))}
        </Box>
    );
};

const LogWindow = () => {
    const [logs, setLogs] = useState<LogEntry[]>([]);

    useEffect(() => {
        setLogs(logStore.getLogs(10));

        const handleLog = () => {
            setLogs(logStore.getLogs(10));
        };

        logStore.on('log', handleLog);
        return () => {
            logStore.off('log', handleLog);
        };
    }, []);

    return (
        <Box flexDirection="column" borderStyle="single" borderColor="gray" marginTop={1}>
            <Text bold>Recent Logs</Text>
            {logs.map((entry, i) => (
                <Box key={i}>
                    <Text color="gray">[{entry.timestamp}] </Text>
                    <Text color={
                        entry.level === 'error' ? 'red' :
                        entry.level === 'warn' ? 'yellow' : 'white'
                    }>
                        {entry.message}
                    </Text>
                </Box>
            ))}
        </Box>
    );
};

export const Dashboard: React.FC<DashboardProps> = ({ pipelineManager }) => {
    const [states, setStates] = useState<LeagueState[]>([]);
    const [completed, setCompleted] = useState<DatasetResult[]>([]);

    useEffect(() => {
        setStates(pipelineManager.getAllStates());

        const handleUpdate = (newStates: LeagueState[]) => {
            setStates(newStates);
        };

        const handleComplete = (result: DatasetResult) => {
            setCompleted(previous => [...previous, result]);
        };

        pipelineManager.on('state-update', handleUpdate);
        pipelineManager.on('dataset-complete', handleComplete);
        return () => {
            pipelineManager.off('state-update', handleUpdate);
            pipelineManager.off('dataset-complete', handleComplete);
        };
    }, [pipelineManager]);

    return (
        <Box flexDirection="column" padding={1}>
            <Text bold color="green" underline>League Stats Crawl</Text>
            <Text color="gray">Datasets: {pipelineManager.getDatasetNames().join(', ')}</Text>
            <Text color="gray">Leagues are fetched one at a time with a politeness delay between requests</Text>

            <Box marginY={1}>
                <StatusTable states={states} />
            </Box>

            <CompletedDatasets results={completed} />

            <LogWindow />
        </Box>
    );
};
